/**
 * Error types for probewire
 *
 * Every public operation either returns a well-formed value or throws one
 * of these classes.
 */

/**
 * Stable error codes, one per error class
 */
export const ErrorCode = {
  E_STATE_INVALID: 'E_STATE_INVALID',
  E_PROCESS_FAILED: 'E_PROCESS_FAILED',
  E_HOST_RESOLVE: 'E_HOST_RESOLVE',
  E_MALFORMED_REPLY: 'E_MALFORMED_REPLY',
  E_INVALID_ARGUMENT: 'E_INVALID_ARGUMENT'
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorOptions = {
  cause?: unknown;
};

/**
 * Base class carrying the error code
 */
export abstract class ProbewireError extends Error {
  abstract readonly code: ErrorCodeType;

  constructor(message: string, options?: ErrorOptions) {
    super(message);
    this.name = new.target.name;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/**
 * Operation is not valid in the session's current state
 */
export class StateError extends ProbewireError {
  readonly code = ErrorCode.E_STATE_INVALID;
}

/**
 * The mtr-packet subprocess could not be used: it failed to launch, failed
 * its capability check, exited, or broke the wire framing
 */
export class ProcessError extends ProbewireError {
  readonly code = ErrorCode.E_PROCESS_FAILED;
}

/**
 * No address of an acceptable IP version exists for a hostname
 */
export class HostResolveError extends ProbewireError {
  readonly code = ErrorCode.E_HOST_RESOLVE;
  readonly hostname: string;

  constructor(hostname: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.hostname = hostname;
  }
}

/**
 * A reply line did not follow the wire syntax.
 * Never surfaced to callers; the dispatcher wraps it in a ProcessError.
 */
export class MalformedReplyError extends ProbewireError {
  readonly code = ErrorCode.E_MALFORMED_REPLY;
  readonly line: string;

  constructor(line: string, message: string) {
    super(`${message}: ${JSON.stringify(line)}`);
    this.line = line;
  }
}

/**
 * Caller-supplied options were rejected
 */
export class InvalidArgumentError extends ProbewireError {
  readonly code = ErrorCode.E_INVALID_ARGUMENT;
}

export function isProbewireError(error: unknown): error is ProbewireError {
  return error instanceof ProbewireError;
}

/**
 * Render any thrown value as a message for logs
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
