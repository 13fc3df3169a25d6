/**
 * @faultline/errors
 *
 * Internal error taxonomy for Faultline plus the signal carriers that
 * cross frame boundaries.
 *
 * Internal errors are built on 4 behavioral base types:
 * ValidationError, NotFoundError, ExternalError, InternalError.
 * Each carries a `.code` from the catalog that discriminates the specific
 * condition. Use `error.code === "XXX"` for fine-grained matching, or
 * `instanceof BaseType` for category matching.
 */

export const PACKAGE_NAME = "@faultline/errors" as const;

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, FaultlineError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export { getErrorMessage, wrapError } from "./utils.js";

// ============================================================================
// BASE ERROR TYPES
// ============================================================================

export { ExternalError, InternalError, NotFoundError, ValidationError } from "./bases/index.js";

export type {
  ExternalCodes,
  FaultlineErrorOptions,
  InternalCodes,
  NotFoundCodes,
  ValidationCodes,
  ValidationIssue,
} from "./types.js";

// ============================================================================
// CONCRETE ERRORS
// ============================================================================

export {
  AuditStoreError,
  CatalogFileNotFoundError,
  CatalogParseError,
  CatalogValidationError,
  FrameConfigurationError,
  ParameterValidationError,
  SnapshotValidationError,
  TreeDecodeError,
} from "./classes.js";

// ============================================================================
// SIGNAL CARRIERS
// ============================================================================

export {
  DEFAULT_SEVERITY,
  DEFAULT_STATE,
  HostFailure,
  type HostFailureOptions,
  isHostFailure,
  isSignaledError,
  type SignalOptions,
  SignaledError,
  USER_DEFINED_ERROR_NUMBER,
} from "./signal.js";
