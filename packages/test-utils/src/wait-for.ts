import type { WaitForOptions } from './types.js';

/**
 * Poll until a condition holds
 */
export async function waitFor<T>(
  predicate: () => T | Promise<T>,
  options: WaitForOptions = {}
): Promise<T> {
  const { timeout = 1000, interval = 5, errorMessage = 'Timeout waiting for condition' } = options;

  const startTime = Date.now();
  let lastError: unknown;

  while (Date.now() - startTime < timeout) {
    try {
      const result = await predicate();
      if (result) {
        return result;
      }
    } catch (error) {
      lastError = error;
    }

    await delay(interval);
  }

  throw new Error(`${errorMessage} (timeout: ${timeout}ms)`, { cause: lastError });
}

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
