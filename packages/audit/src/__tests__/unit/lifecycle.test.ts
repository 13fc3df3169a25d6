import { type Clock, createParameterSnapshot } from "@faultline/core";
import { AuditStoreError } from "@faultline/errors";
import { describe, expect, it, vi } from "vitest";
import { AuditLog, InMemoryAuditStore } from "../../index.js";

const START = new Date("2026-03-10T12:00:00.000Z");
const END = new Date("2026-03-10T12:00:05.000Z");

function sequenceClock(...times: Date[]): Clock {
  const queue = [...times];
  return { now: () => queue.shift() ?? END };
}

function setup(params: Record<string, string>, clock: Clock = sequenceClock(START, END)) {
  const store = new InMemoryAuditStore();
  const audit = new AuditLog({ store, parameters: createParameterSnapshot(params), clock });
  return { store, audit };
}

describe("AuditLog.begin", () => {
  it("returns no id when the toggle is off", async () => {
    const { store, audit } = setup({});
    expect(await audit.begin("ArticleInsert", false, { name: "x" })).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("uses the write toggle for frames that modify state", async () => {
    const { store, audit } = setup({ AuditWriteLog: "yes" });
    const id = await audit.begin("ArticleInsert", false, { name: "x" });

    expect(id).toBe("1");
    expect(store.list()).toEqual([
      {
        id: "1",
        procedureName: "ArticleInsert",
        inputData: '{"name":"x"}',
        outputData: null,
        errorMessage: null,
        startTime: START,
        endTime: null,
      },
    ]);
  });

  it("uses the read toggle for read-only frames", async () => {
    const { audit } = setup({ AuditWriteLog: "yes", AuditReadLog: "no" });
    expect(await audit.begin("ArticleGet", true)).toBeUndefined();
    expect(audit.isEnabled(true)).toBe(false);
    expect(audit.isEnabled(false)).toBe(true);
  });

  it("stores null input when none is given", async () => {
    const { store, audit } = setup({ AuditReadLog: "1" });
    const id = await audit.begin("ArticleGet", true);
    expect(id).toBe("1");
    expect(store.list()[0]?.inputData).toBeNull();
  });

  it("redacts credentials in the input", async () => {
    const { store, audit } = setup({ AuditWriteLog: "true" });
    await audit.begin("Connect", false, { user: "app", password: "test-secret" });
    expect(store.list()[0]?.inputData).toBe('{"user":"app","password":"[REDACTED]"}');
  });

  it("wraps store failures", async () => {
    const store = new InMemoryAuditStore();
    vi.spyOn(store, "insert").mockRejectedValue(new Error("disk full"));
    const audit = new AuditLog({
      store,
      parameters: createParameterSnapshot({ AuditWriteLog: "y" }),
    });

    await expect(audit.begin("ArticleInsert", false)).rejects.toBeInstanceOf(AuditStoreError);
  });
});

describe("AuditLog.end / fail", () => {
  it("are no-ops without an id", async () => {
    const { store, audit } = setup({ AuditWriteLog: "yes" });
    const close = vi.spyOn(store, "close");

    expect(await audit.end(undefined, { ok: true })).toBe(false);
    expect(await audit.fail(undefined, '<E N="1" M="x" P="p"/>')).toBe(false);
    expect(close).not.toHaveBeenCalled();
  });

  it("end sets completion time and output", async () => {
    const { store, audit } = setup({ AuditWriteLog: "yes" });
    const id = await audit.begin("ArticleInsert", false);

    expect(await audit.end(id, { articleId: 10 })).toBe(true);
    const entry = store.list()[0];
    expect(entry?.endTime).toEqual(END);
    expect(entry?.outputData).toBe('{"articleId":10}');
    expect(entry?.errorMessage).toBeNull();
  });

  it("fail stores the encoded tree", async () => {
    const { store, audit } = setup({ AuditWriteLog: "yes" });
    const id = await audit.begin("ArticleInsert", false);

    expect(await audit.fail(id, '<E N="1" M="x" P="p"/>')).toBe(true);
    expect(store.list()[0]?.errorMessage).toBe('<E N="1" M="x" P="p"/>');
    expect(store.list()[0]?.endTime).toEqual(END);
  });

  it("closes an entry exactly once", async () => {
    const { store, audit } = setup({ AuditWriteLog: "yes" });
    const id = await audit.begin("ArticleInsert", false);

    expect(await audit.end(id)).toBe(true);
    expect(await audit.fail(id, "<E/>")).toBe(false);
    expect(store.list()[0]?.errorMessage).toBeNull();
  });
});
