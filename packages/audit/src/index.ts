/**
 * @faultline/audit
 *
 * Parameter-gated audit entries for frame invocations.
 */

export const PACKAGE_NAME = "@faultline/audit" as const;

export { AuditLog } from "./lifecycle.js";
export { InMemoryAuditStore } from "./memory-store.js";
export {
  computePurgeCutoff,
  DEFAULT_PURGE_BATCH_SIZE,
  DEFAULT_RETENTION,
  type PurgeAuditLogOptions,
  purgeAuditLog,
} from "./purge.js";
export {
  BUILT_IN_SECRET_PATTERNS,
  buildRedactionPatterns,
  DEFAULT_MAX_PAYLOAD_SIZE,
  redactSecrets,
  serializePayload,
  truncatePayload,
} from "./redaction.js";
export type {
  AuditLogConfig,
  AuditRedactionConfig,
  RedactionPattern,
  RetentionPeriod,
} from "./types.js";
