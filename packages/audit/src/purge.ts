import type { PurgeableAuditStore } from "@faultline/core";
import type { RetentionPeriod } from "./types.js";

export const DEFAULT_RETENTION: RetentionPeriod = { weeks: 1 };
export const DEFAULT_PURGE_BATCH_SIZE = 100;

export interface PurgeAuditLogOptions {
  readonly now: Date;
  readonly retention?: RetentionPeriod;
  readonly batchSize?: number;
}

/**
 * Start of the retention window: UTC midnight of `now`, minus the period.
 */
export function computePurgeCutoff(now: Date, retention: RetentionPeriod = DEFAULT_RETENTION): Date {
  const cutoff = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
  cutoff.setUTCMonth(cutoff.getUTCMonth() - (retention.months ?? 0));
  cutoff.setUTCDate(cutoff.getUTCDate() - (retention.weeks ?? 0) * 7 - (retention.days ?? 0));
  return cutoff;
}

/**
 * Delete one batch of expired audit entries. Returns the number deleted.
 */
export async function purgeAuditLog(
  store: PurgeableAuditStore,
  options: PurgeAuditLogOptions,
): Promise<number> {
  const limit = Math.max(0, Math.floor(options.batchSize ?? DEFAULT_PURGE_BATCH_SIZE));
  if (limit === 0) {
    return 0;
  }
  return store.deleteExpired({
    cutoff: computePurgeCutoff(options.now, options.retention),
    limit,
  });
}
