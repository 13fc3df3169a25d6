import { describe, expect, it, vi } from "vitest";
import { computePurgeCutoff, InMemoryAuditStore, purgeAuditLog } from "../../index.js";

const NOW = new Date("2026-03-10T15:30:00.000Z");

describe("computePurgeCutoff", () => {
  it("defaults to one week before UTC midnight", () => {
    expect(computePurgeCutoff(NOW).toISOString()).toBe("2026-03-03T00:00:00.000Z");
  });

  it("combines months, weeks and days", () => {
    expect(computePurgeCutoff(NOW, { months: 1, days: 2 }).toISOString()).toBe(
      "2026-02-08T00:00:00.000Z",
    );
    expect(computePurgeCutoff(NOW, { weeks: 2 }).toISOString()).toBe("2026-02-24T00:00:00.000Z");
    expect(computePurgeCutoff(NOW, {}).toISOString()).toBe("2026-03-10T00:00:00.000Z");
  });
});

describe("purgeAuditLog", () => {
  it("passes the cutoff and default batch size to the store", async () => {
    const store = new InMemoryAuditStore();
    const spy = vi.spyOn(store, "deleteExpired");

    await purgeAuditLog(store, { now: NOW });

    expect(spy).toHaveBeenCalledWith({ cutoff: new Date("2026-03-03T00:00:00.000Z"), limit: 100 });
  });

  it("deletes expired entries only", async () => {
    const store = new InMemoryAuditStore();
    await store.insert({
      procedureName: "old",
      inputData: null,
      startTime: new Date("2026-02-20T08:00:00.000Z"),
    });
    await store.insert({
      procedureName: "fresh",
      inputData: null,
      startTime: new Date("2026-03-09T08:00:00.000Z"),
    });

    expect(await purgeAuditLog(store, { now: NOW })).toBe(1);
    expect(store.list().map((e) => e.procedureName)).toEqual(["fresh"]);
  });

  it("does nothing for a non-positive batch size", async () => {
    const store = new InMemoryAuditStore();
    const spy = vi.spyOn(store, "deleteExpired");
    expect(await purgeAuditLog(store, { now: NOW, batchSize: 0 })).toBe(0);
    expect(spy).not.toHaveBeenCalled();
  });
});
