import type { AuditStore, PurgeableAuditStore } from "./audit-types.js";
import type { TransactionContext } from "./frame-types.js";

/**
 * Check whether an audit store supports batch deletion
 */
export function isPurgeableAuditStore(store: AuditStore): store is PurgeableAuditStore {
  return "deleteExpired" in store && typeof store.deleteExpired === "function";
}

/**
 * Structural check for a transaction context
 */
export function isTransactionContext(value: unknown): value is TransactionContext {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "isActive" in value &&
    typeof value.isActive === "function" &&
    "begin" in value &&
    typeof value.begin === "function" &&
    "commit" in value &&
    typeof value.commit === "function" &&
    "rollback" in value &&
    typeof value.rollback === "function"
  );
}
