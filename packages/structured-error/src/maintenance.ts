import {
  DEFAULT_PURGE_BATCH_SIZE,
  DEFAULT_RETENTION,
  purgeAuditLog,
  type RetentionPeriod,
} from "@faultline/audit";
import { isPurgeableAuditStore, PURGE_PERIOD } from "@faultline/core";
import { getErrorMessage } from "@faultline/errors";
import { MAINTENANCE_FRAME_NAME, PURGE_UNSUPPORTED_NAME } from "./catalog.js";
import { runFrame } from "./frame.js";
import type { FrameRuntime } from "./runtime.js";
import { parseXml } from "./xml.js";

export interface MaintenanceOptions {
  /** Default: the runtime clock */
  readonly now?: Date;
  /** Overrides the `PurgePeriod` parameter */
  readonly retention?: RetentionPeriod;
  readonly batchSize?: number;
}

/**
 * Parse a `<TimeSpan Month="0" Week="1" Day="0" />` retention value.
 * Returns undefined for anything else.
 */
export function parseRetentionPeriod(value: string | undefined): RetentionPeriod | undefined {
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }

  let element: ReturnType<typeof parseXml>;
  try {
    element = parseXml(value);
  } catch (error: unknown) {
    console.warn(`[maintenance] Ignoring unreadable ${PURGE_PERIOD}: ${getErrorMessage(error)}`);
    return undefined;
  }
  if (element.name !== "TimeSpan") {
    return undefined;
  }

  const attributes = new Map(element.attributes);
  const read = (name: string): number | undefined => {
    const raw = attributes.get(name)?.trim();
    return raw !== undefined && /^\d+$/.test(raw) ? Number(raw) : undefined;
  };
  return { months: read("Month") ?? 0, weeks: read("Week") ?? 0, days: read("Day") ?? 0 };
}

/**
 * Purge one batch of expired audit entries, as its own frame.
 *
 * Retention comes from the options, else the `PurgePeriod` parameter,
 * else one week. Returns the number of entries deleted.
 */
export function runMaintenance(runtime: FrameRuntime, options: MaintenanceOptions = {}): Promise<number> {
  return runFrame(runtime, { name: MAINTENANCE_FRAME_NAME }, async (scope) => {
    const store = runtime.auditStore;
    if (!isPurgeableAuditStore(store)) {
      return scope.raise(PURGE_UNSUPPORTED_NAME);
    }

    const retention =
      options.retention ??
      parseRetentionPeriod(runtime.parameters.get(PURGE_PERIOD)) ??
      DEFAULT_RETENTION;

    return purgeAuditLog(store, {
      now: options.now ?? runtime.clock.now(),
      retention,
      batchSize: options.batchSize ?? DEFAULT_PURGE_BATCH_SIZE,
    });
  });
}
