/**
 * Probe request and result types
 */

export type IpVersion = 4 | 6;

export type ProbeProtocol = 'icmp' | 'udp' | 'tcp' | 'sctp';

/**
 * One entry of an MPLS label stack reported by a router
 */
export type MplsLabel = {
  label: number;
  trafficClass: number;
  bottomOfStack: boolean;
  ttl: number;
};

/**
 * Outcome of a single probe.
 *
 * `timeMs` and `responder` are set for `reply` and `ttl-expired`
 * and null for every other result.
 */
export type ProbeResult = {
  success: boolean;
  result: string;
  timeMs: number | null;
  responder: string | null;
  mpls: MplsLabel[];
};

export type ResolvedAddress = {
  address: string;
  ipVersion: IpVersion;
};
