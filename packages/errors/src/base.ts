import type { BaseErrorType, ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * JSON shape produced by `FaultlineError.toJSON()`
 */
export interface ErrorJSON {
  readonly name: string;
  readonly _tag: BaseErrorType;
  readonly code: ErrorCode;
  readonly domain: ErrorDomain;
  readonly message: string;
  readonly isExpected: boolean;
  readonly timestamp: string;
  readonly metadata?: Record<string, string> | undefined;
}

/**
 * Abstract base for every internal Faultline error.
 *
 * Subclasses resolve `domain` and `isExpected` from the catalog entry of
 * their `code`. Use `instanceof` on a base type for category matching and
 * `error.code === "..."` for the specific condition.
 */
export abstract class FaultlineError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly timestamp: Date;

  constructor(message: string, metadata?: Record<string, string>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.metadata = metadata;
    this.timestamp = new Date();
  }

  toJSON(): ErrorJSON {
    return {
      name: this.name,
      _tag: this._tag,
      code: this.code,
      domain: this.domain,
      message: this.message,
      isExpected: this.isExpected,
      timestamp: this.timestamp.toISOString(),
      metadata: this.metadata,
    };
  }
}
