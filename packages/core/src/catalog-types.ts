/**
 * Error catalog contracts.
 *
 * A catalog maps `(ownerProcedure, errorName)` to a message template pair.
 * Definitions are immutable at runtime; refreshing a catalog means building
 * a new one.
 */

/** Owner name whose entries act as fallback for every procedure */
export const FALLBACK_OWNER = "ErrorHandler";

/** Error name looked up under the fallback owner when a definition is missing */
export const UNKNOWN_ERROR_NAME = "UnknownError";

export interface ErrorDefinition {
  /** Unique numeric code, surfaced as the `N` attribute of an error node */
  readonly errorId: number;
  readonly ownerProcedure: string;
  readonly errorName: string;
  /** Template with `#Token#` placeholders, shown to end users */
  readonly userMessageTemplate: string;
  /** Optional template for developers; absent means "same as user message" */
  readonly developerMessageTemplate?: string | undefined;
}

/**
 * Read interface over the error catalog.
 */
export interface ErrorCatalog {
  /** Exact match on owner and error name */
  readonly find: (ownerProcedure: string, errorName: string) => ErrorDefinition | undefined;
  readonly definitions: () => readonly ErrorDefinition[];
}
