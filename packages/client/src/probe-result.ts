/**
 * Map a send-probe reply onto a ProbeResult
 */

import {
  MICROSECONDS_PER_MS,
  type MplsLabel,
  ProcessError,
  type ProbeResult,
  type Reply,
  REPLY_KEYWORD
} from '@probewire/core';

const MPLS_FIELDS_PER_LABEL = 4;

/** Keywords that carry a responder and a round-trip time */
const TIMED_KEYWORDS: ReadonlySet<string> = new Set([
  REPLY_KEYWORD.reply,
  REPLY_KEYWORD.ttlExpired
]);

function parseCount(reply: Reply, field: string, raw: string): number {
  const value = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(value)) {
    throw new ProcessError(
      `Reply ${reply.token} has a non-integer ${field}: ${JSON.stringify(raw)}`
    );
  }
  return value;
}

/**
 * Parse `label,traffic-class,bottom-of-stack,ttl[,...]` keeping the order given
 */
export function parseMpls(reply: Reply): MplsLabel[] {
  const raw = reply.fields.get('mpls');
  if (raw === undefined || raw === '') return [];

  const values = raw.split(',').map((part) => parseCount(reply, 'mpls value', part));
  if (values.length % MPLS_FIELDS_PER_LABEL !== 0) {
    throw new ProcessError(
      `Reply ${reply.token} has ${values.length} mpls values, ` +
        `not a multiple of ${MPLS_FIELDS_PER_LABEL}`
    );
  }

  const labels: MplsLabel[] = [];
  for (let i = 0; i < values.length; i += MPLS_FIELDS_PER_LABEL) {
    const [label = 0, trafficClass = 0, bottomOfStack = 0, ttl = 0] = values.slice(
      i,
      i + MPLS_FIELDS_PER_LABEL
    );
    labels.push({ label, trafficClass, bottomOfStack: bottomOfStack !== 0, ttl });
  }
  return labels;
}

export function toProbeResult(reply: Reply): ProbeResult {
  const mpls = parseMpls(reply);

  if (!TIMED_KEYWORDS.has(reply.keyword)) {
    return { success: false, result: reply.keyword, timeMs: null, responder: null, mpls };
  }

  const responder = reply.fields.get('ip-4') ?? reply.fields.get('ip-6');
  if (!responder) {
    throw new ProcessError(`Reply ${reply.token} (${reply.keyword}) names no responder`);
  }

  const rtt = reply.fields.get('round-trip-time');
  if (rtt === undefined) {
    throw new ProcessError(`Reply ${reply.token} (${reply.keyword}) has no round-trip-time`);
  }

  return {
    success: reply.keyword === REPLY_KEYWORD.reply,
    result: reply.keyword,
    timeMs: parseCount(reply, 'round-trip-time', rtt) / MICROSECONDS_PER_MS,
    responder,
    mpls
  };
}
