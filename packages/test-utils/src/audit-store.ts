import { InMemoryAuditStore } from "@faultline/audit";
import type {
  AuditClose,
  AuditEntry,
  AuditEntryId,
  ExpiredEntryQuery,
  NewAuditEntry,
  PurgeableAuditStore,
} from "@faultline/core";
import { vi } from "vitest";

/**
 * In-memory audit store whose operations are spies. Set `failInsert` or
 * `failClose` to make later calls reject.
 */
export class MockAuditStore implements PurgeableAuditStore {
  readonly backing = new InMemoryAuditStore();
  failInsert: Error | undefined;
  failClose: Error | undefined;

  readonly insert = vi.fn(async (entry: NewAuditEntry): Promise<AuditEntryId> => {
    if (this.failInsert !== undefined) {
      throw this.failInsert;
    }
    return this.backing.insert(entry);
  });

  readonly close = vi.fn(async (id: AuditEntryId, close: AuditClose): Promise<boolean> => {
    if (this.failClose !== undefined) {
      throw this.failClose;
    }
    return this.backing.close(id, close);
  });

  readonly get = vi.fn(
    async (id: AuditEntryId): Promise<AuditEntry | undefined> => this.backing.get(id),
  );

  readonly deleteExpired = vi.fn(
    async (query: ExpiredEntryQuery): Promise<number> => this.backing.deleteExpired(query),
  );

  list(): readonly AuditEntry[] {
    return this.backing.list();
  }
}
