/**
 * Audit store contracts.
 */

/** Store-assigned identifier of an audit entry */
export type AuditEntryId = string;

export interface AuditEntry {
  readonly id: AuditEntryId;
  readonly procedureName: string;
  /** Redacted JSON text of the frame's input, if any */
  readonly inputData: string | null;
  readonly outputData: string | null;
  /** Encoded error tree, set only when the entry closed through a failure */
  readonly errorMessage: string | null;
  readonly startTime: Date;
  readonly endTime: Date | null;
}

export interface NewAuditEntry {
  readonly procedureName: string;
  readonly inputData: string | null;
  readonly startTime: Date;
}

export interface AuditClose {
  readonly endTime: Date;
  readonly outputData?: string | null | undefined;
  readonly errorMessage?: string | null | undefined;
}

export interface AuditStore {
  readonly insert: (entry: NewAuditEntry) => Promise<AuditEntryId>;
  /**
   * Close an entry if it is still open. Returns false when the entry does
   * not exist or was already closed. Must be atomic per entry.
   */
  readonly close: (id: AuditEntryId, close: AuditClose) => Promise<boolean>;
  readonly get: (id: AuditEntryId) => Promise<AuditEntry | undefined>;
}

/** Deletion criteria for one purge batch */
export interface ExpiredEntryQuery {
  /** Entries started at or after the cutoff are kept */
  readonly cutoff: Date;
  readonly limit: number;
}

export interface PurgeableAuditStore extends AuditStore {
  /**
   * Delete up to `limit` entries that started before the cutoff and are
   * either still open or ended before it. Returns the number deleted.
   */
  readonly deleteExpired: (query: ExpiredEntryQuery) => Promise<number>;
}
