import { ProbeClient, type ProbeClientOptions } from './probe-client.js';

/**
 * Run `fn` with an open client, closing it afterwards even when `fn` throws
 */
export async function withProbeClient<T>(
  options: ProbeClientOptions,
  fn: (client: ProbeClient) => Promise<T>
): Promise<T> {
  const client = new ProbeClient(options);
  await client.open();
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
