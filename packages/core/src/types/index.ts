export type { ArgumentValue, Command, Reply, WireSyntax } from './wire.js';
export type {
  IpVersion,
  MplsLabel,
  ProbeProtocol,
  ProbeResult,
  ResolvedAddress
} from './probe.js';
