import { describe, expect, it, vi } from "vitest";
import type { AuditStore, PurgeableAuditStore } from "../../index.js";
import { isPurgeableAuditStore, isTransactionContext } from "../../index.js";

const baseStore: AuditStore = {
  insert: vi.fn(async () => "1"),
  close: vi.fn(async () => true),
  get: vi.fn(async () => undefined),
};

describe("isPurgeableAuditStore", () => {
  it("detects deleteExpired", () => {
    const store: PurgeableAuditStore = { ...baseStore, deleteExpired: vi.fn(async () => 0) };
    expect(isPurgeableAuditStore(store)).toBe(true);
    expect(isPurgeableAuditStore(baseStore)).toBe(false);
  });
});

describe("isTransactionContext", () => {
  it("accepts objects with the four operations", () => {
    expect(
      isTransactionContext({
        isActive: () => false,
        begin: async () => {},
        commit: async () => {},
        rollback: async () => {},
      }),
    ).toBe(true);
  });

  it("rejects partial objects and primitives", () => {
    expect(isTransactionContext({ isActive: () => false })).toBe(false);
    expect(isTransactionContext(null)).toBe(false);
    expect(isTransactionContext("tx")).toBe(false);
  });
});
