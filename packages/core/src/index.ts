/**
 * @faultline/core
 *
 * Shared contracts for the error catalog, runtime parameters, audit store,
 * frames and transactions.
 */

export const PACKAGE_NAME = "@faultline/core" as const;

export type {
  AuditClose,
  AuditEntry,
  AuditEntryId,
  AuditStore,
  ExpiredEntryQuery,
  NewAuditEntry,
  PurgeableAuditStore,
} from "./audit-types.js";
export {
  type ErrorCatalog,
  type ErrorDefinition,
  FALLBACK_OWNER,
  UNKNOWN_ERROR_NAME,
} from "./catalog-types.js";
export { type Clock, systemClock } from "./clock-types.js";
export {
  AUDIT_READ_LOG,
  AUDIT_WRITE_LOG,
  DEBUG_MODE,
  DEFAULT_PARAMETERS,
  PURGE_PERIOD,
  type ParameterRow,
  type ParameterSnapshot,
} from "./config-types.js";
export type { FrameIdentity, SessionInfo, TransactionContext } from "./frame-types.js";
export {
  type CreateParameterSnapshotOptions,
  createParameterSnapshot,
  isTruthyParameter,
  ParameterRowSchema,
} from "./parameters.js";
export { isPurgeableAuditStore, isTransactionContext } from "./type-guards.js";
