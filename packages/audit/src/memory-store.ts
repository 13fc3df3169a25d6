import type {
  AuditClose,
  AuditEntry,
  AuditEntryId,
  ExpiredEntryQuery,
  NewAuditEntry,
  PurgeableAuditStore,
} from "@faultline/core";

/**
 * In-process audit store with sequential string ids.
 *
 * Entries are kept in insertion order. Close is a check-and-set with no
 * await in between, so concurrent closes of one entry resolve to a single
 * winner.
 */
export class InMemoryAuditStore implements PurgeableAuditStore {
  private readonly entries = new Map<AuditEntryId, AuditEntry>();
  private nextId = 1;

  async insert(entry: NewAuditEntry): Promise<AuditEntryId> {
    const id = String(this.nextId++);
    this.entries.set(
      id,
      Object.freeze({
        id,
        procedureName: entry.procedureName,
        inputData: entry.inputData,
        outputData: null,
        errorMessage: null,
        startTime: entry.startTime,
        endTime: null,
      }),
    );
    return id;
  }

  async close(id: AuditEntryId, close: AuditClose): Promise<boolean> {
    const current = this.entries.get(id);
    if (current === undefined || current.endTime !== null) {
      return false;
    }
    this.entries.set(
      id,
      Object.freeze({
        ...current,
        endTime: close.endTime,
        outputData: close.outputData ?? null,
        errorMessage: close.errorMessage ?? null,
      }),
    );
    return true;
  }

  async get(id: AuditEntryId): Promise<AuditEntry | undefined> {
    return this.entries.get(id);
  }

  async deleteExpired(query: ExpiredEntryQuery): Promise<number> {
    const cutoff = query.cutoff.getTime();
    let deleted = 0;
    for (const [id, entry] of this.entries) {
      if (deleted >= query.limit) {
        break;
      }
      const expired =
        entry.startTime.getTime() < cutoff &&
        (entry.endTime === null || entry.endTime.getTime() < cutoff);
      if (expired) {
        this.entries.delete(id);
        deleted++;
      }
    }
    return deleted;
  }

  /** All entries in insertion order */
  list(): readonly AuditEntry[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }
}
