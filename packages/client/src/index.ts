/**
 * @probewire/client - Asynchronous network probes through mtr-packet
 *
 * @example
 * ```ts
 * import { withProbeClient } from '@probewire/client';
 *
 * const result = await withProbeClient({}, (client) => client.probe('example.com', { ttl: 4 }));
 * console.log(result.result, result.responder, result.timeMs);
 * ```
 */

export { ProbeClient, type ProbeClientOptions } from './probe-client.js';
export { buildProbeCommand } from './probe-command.js';
export { parseMpls, toProbeResult } from './probe-result.js';
export { withProbeClient } from './with-probe-client.js';

export {
  type ClientConfigInput,
  ErrorCode,
  HostResolveError,
  InvalidArgumentError,
  type IpVersion,
  type Logger,
  type MplsLabel,
  ProcessError,
  type ProbeOptions,
  type ProbeProtocol,
  type ProbeResult,
  ProbewireError,
  StateError
} from '@probewire/core';
export type { SubmitOptions } from '@probewire/runtime';
