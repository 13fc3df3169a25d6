/**
 * @faultline/structured-error
 *
 * Structured error trees for chains of frames: catalog lookup with token
 * substitution, a size-bounded wire encoding and the dispatch that turns
 * whatever a frame caught into a signal for its caller.
 */

export const PACKAGE_NAME = "@faultline/structured-error" as const;

// ============================================================================
// CATALOG
// ============================================================================

export {
  BUILTIN_ERROR_DEFINITIONS,
  type CreateErrorCatalogOptions,
  createErrorCatalog,
  DEADLOCK_NAME,
  INDEX_VIOLATION_NAME,
  MAINTENANCE_FRAME_NAME,
  PURGE_UNSUPPORTED_NAME,
  UNKNOWN_SYSTEM_ERROR_NAME,
} from "./catalog.js";
export {
  type LoadCatalogOptions,
  loadCatalog,
  type ParseCatalogOptions,
  parseCatalogYaml,
} from "./catalog-loader.js";
export {
  type CatalogFile,
  CatalogFileEntrySchema,
  CatalogFileSchema,
  ErrorDefinitionSchema,
} from "./catalog-schema.js";

// ============================================================================
// TOKENS, LOOKUP, TREES
// ============================================================================

export {
  CHILD_MESSAGE_TOKEN,
  createTokenSet,
  ERROR_ID_TOKEN,
  ERROR_NAME_TOKEN,
  LIMIT_LENGTH_TOKEN,
  LINE_TOKEN,
  PROCEDURE_NAME_TOKEN,
  PROCID_TOKEN,
  substitute,
  type TokenInput,
  type TokenSet,
  type TokenValue,
} from "./tokens.js";
export {
  BUILTIN_UNKNOWN_ERROR_CODE,
  BUILTIN_UNKNOWN_ERROR_TEMPLATE,
  type BuiltError,
  buildErrorNode,
  type ErrorRequest,
  formatError,
  type LookupContext,
  type LookupResult,
  lookupError,
  type ProcedureResolver,
} from "./lookup.js";
export {
  type AttachmentNode,
  type ChildNode,
  type ContextNode,
  createAttachmentNode,
  createContextNode,
  createErrorNode,
  type ErrorNode,
  type ErrorNodeInit,
  isAttachmentNode,
  isContextNode,
  isErrorNode,
} from "./tree.js";
export { decodeTree, encodeTree, looksLikeMarkup, tryDecodeTree } from "./codec.js";
export { decodeName, encodeName } from "./xml.js";
export {
  DEFAULT_MESSAGE_BUDGET,
  type FitOptions,
  type FitResult,
  fitTree,
  type Reduction,
  type ReductionStep,
  reduceOnce,
} from "./truncate.js";
export { wrapMessage } from "./wrap.js";

// ============================================================================
// FRAMES AND DISPATCH
// ============================================================================

export {
  captureFailure,
  type FailureState,
  FailureSnapshotSchema,
  parseFailureSnapshot,
  UNNUMBERED_FAILURE,
} from "./failure.js";
export {
  type ComposedFailure,
  classifyFailure,
  composeFailure,
  type FailureClassification,
  type HandleFailureRequest,
  handleFailure,
  KNOWN_HOST_FAILURES,
} from "./dispatch.js";
export { ProcedureRegistry } from "./registry.js";
export { enterTransaction, TransactionGuard } from "./transaction.js";
export { createFrameRuntime, type FrameRuntime, type FrameRuntimeConfig } from "./runtime.js";
export { type FrameOptions, type FrameScope, type RaiseOptions, runFrame } from "./frame.js";
export { type MaintenanceOptions, parseRetentionPeriod, runMaintenance } from "./maintenance.js";
