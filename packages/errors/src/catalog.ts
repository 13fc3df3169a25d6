/**
 * Error Catalog - Single Source of Truth
 *
 * Defines every internal error code raised by Faultline itself. These are
 * configuration and infrastructure faults (bad catalog files, malformed wire
 * text, unreachable stores); failures that travel between frames are carried
 * by `SignaledError` and `HostFailure` instead.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: INTERNAL, CATALOG, PARAMETER, TREE, AUDIT, FRAME
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "NotFoundError" | "ExternalError" | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - System failures and unknown errors
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError",
    isExpected: false,
    title: "Internal error",
    description: "An operation failed in a way no other code describes",
  },

  // ============================================================================
  // CATALOG ERRORS - Error template definitions
  // ============================================================================
  CATALOG_INVALID: {
    domain: "catalog",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid error catalog",
    description: "The error definitions failed validation",
  },
  CATALOG_PARSE_FAILED: {
    domain: "catalog",
    baseType: "ValidationError",
    isExpected: true,
    title: "Error catalog parse failed",
    description: "The error catalog file is not valid YAML",
  },
  CATALOG_FILE_NOT_FOUND: {
    domain: "catalog",
    baseType: "NotFoundError",
    isExpected: true,
    title: "Error catalog file not found",
    description: "The error catalog file does not exist",
  },

  // ============================================================================
  // PARAMETER ERRORS - Runtime configuration rows
  // ============================================================================
  PARAMETERS_INVALID: {
    domain: "parameter",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid parameters",
    description: "The runtime parameter rows failed validation",
  },

  // ============================================================================
  // TREE ERRORS - Structured error wire text
  // ============================================================================
  TREE_DECODE_FAILED: {
    domain: "tree",
    baseType: "ValidationError",
    isExpected: true,
    title: "Structured error decode failed",
    description: "The text is not a well-formed structured error",
  },
  SNAPSHOT_INVALID: {
    domain: "tree",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid failure snapshot",
    description: "The captured failure snapshot failed validation",
  },

  // ============================================================================
  // AUDIT ERRORS - Audit entry storage
  // ============================================================================
  AUDIT_STORE_FAILED: {
    domain: "audit",
    baseType: "ExternalError",
    isExpected: false,
    title: "Audit store failed",
    description: "The audit store rejected or failed a write",
  },

  // ============================================================================
  // FRAME ERRORS - Frame registration and invocation
  // ============================================================================
  FRAME_INVALID: {
    domain: "frame",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid frame",
    description: "The frame name or options are invalid",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
