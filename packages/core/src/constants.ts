/**
 * Global constants for probewire
 * Keep values environment-agnostic and dependency-free.
 */

/** Executable launched when neither an option nor the environment names one */
export const DEFAULT_EXECUTABLE = 'mtr-packet' as const;

/** Environment variable overriding the probe executable */
export const EXECUTABLE_ENV_VAR = 'MTR_PACKET' as const;

/** Environment variable selecting the default log level */
export const LOG_LEVEL_ENV_VAR = 'PROBEWIRE_LOG_LEVEL' as const;

/** Command verbs understood by mtr-packet */
export const VERB = {
  checkSupport: 'check-support',
  sendProbe: 'send-probe'
} as const;

/** Reply keywords the client interprets */
export const REPLY_KEYWORD = {
  featureSupport: 'feature-support',
  reply: 'reply',
  ttlExpired: 'ttl-expired',
  noReply: 'no-reply'
} as const;

/** Feature whose support is verified when a session opens */
export const REQUIRED_FEATURE = 'send-probe' as const;

export const DEFAULT_TTL = 32;
export const DEFAULT_TIMEOUT_SEC = 10;
export const DEFAULT_PROTOCOL = 'icmp' as const;

/** Round-trip times are reported in microseconds */
export const MICROSECONDS_PER_MS = 1000;
