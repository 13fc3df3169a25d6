/**
 * Signal carriers: the failures that cross frame boundaries.
 *
 * These are not internal faults. A `SignaledError` is what a frame throws
 * to its caller: its message is (usually) an encoded structured error tree.
 * A `HostFailure` is a low-level failure from a non-participating source,
 * identified by a numeric code (a database driver's unique-index violation,
 * a deadlock victim, ...).
 */

/** Numbers at or above this value are raised by frames, never by the host. */
export const USER_DEFINED_ERROR_NUMBER = 50000;

/** Severity used when a signal does not specify one */
export const DEFAULT_SEVERITY = 16;

/** State used when a signal does not specify one */
export const DEFAULT_STATE = 1;

export interface SignalOptions {
  /** Name of the procedure that raised the signal */
  readonly procedure: string;
  readonly number?: number | undefined;
  readonly line?: number | undefined;
  readonly severity?: number | undefined;
  readonly state?: number | undefined;
  readonly cause?: unknown;
}

/**
 * A failure raised by a frame or re-raised by the propagation dispatcher.
 */
export class SignaledError extends Error {
  readonly number: number;
  readonly procedure: string;
  readonly line: number | undefined;
  readonly severity: number;
  readonly state: number;

  constructor(message: string, options: SignalOptions) {
    super(message, ...(options.cause !== undefined ? [{ cause: options.cause }] : []));
    this.name = "SignaledError";
    this.number = options.number ?? USER_DEFINED_ERROR_NUMBER;
    this.procedure = options.procedure;
    this.line = options.line;
    this.severity = options.severity ?? DEFAULT_SEVERITY;
    this.state = options.state ?? DEFAULT_STATE;
  }
}

export interface HostFailureOptions {
  readonly procedure?: string | undefined;
  readonly line?: number | undefined;
  readonly severity?: number | undefined;
  readonly state?: number | undefined;
  readonly cause?: unknown;
}

/**
 * A low-level failure reported by the host (storage engine, driver, runtime)
 * with its native numeric code.
 */
export class HostFailure extends Error {
  readonly number: number;
  readonly procedure: string | undefined;
  readonly line: number | undefined;
  readonly severity: number;
  readonly state: number;

  constructor(number: number, message: string, options: HostFailureOptions = {}) {
    super(message, ...(options.cause !== undefined ? [{ cause: options.cause }] : []));
    this.name = "HostFailure";
    this.number = number;
    this.procedure = options.procedure;
    this.line = options.line;
    this.severity = options.severity ?? DEFAULT_SEVERITY;
    this.state = options.state ?? DEFAULT_STATE;
  }
}

/**
 * Check if a value is a SignaledError
 */
export function isSignaledError(value: unknown): value is SignaledError {
  return value instanceof SignaledError;
}

/**
 * Check if a value is a HostFailure
 */
export function isHostFailure(value: unknown): value is HostFailure {
  return value instanceof HostFailure;
}
