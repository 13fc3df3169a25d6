import { HostFailure } from "@faultline/errors";
import { createTestRuntime, FakeTransaction, rejectionOf, TEST_NOW } from "@faultline/test-utils";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createAttachmentNode, decodeTree, runFrame } from "../../index.js";

const RAISED =
  '<E N="50001" M="The Article 10 specified was not found" P="ArticleGet" L="51"><T ThrownBy="ArticleGet" ThrownLine="51" DB="testdb" SPID="51"/><T EntityId="10"/></E>';

afterEach(() => {
  vi.restoreAllMocks();
});

describe("runFrame", () => {
  it("returns the body's result", async () => {
    const { runtime } = createTestRuntime();
    await expect(runFrame(runtime, { name: "ArticleGet", readOnly: true }, () => 42)).resolves.toBe(42);
  });

  it("exposes the frame identity to the body", async () => {
    const { runtime } = createTestRuntime();
    const frame = await runFrame(runtime, { name: "ArticleGet" }, (scope) => scope.frame);
    expect(frame).toEqual({ id: 1, name: "ArticleGet" });
  });

  it("formats errors without raising them", async () => {
    const { runtime } = createTestRuntime();
    const text = await runFrame(runtime, { name: "ArticleGet" }, (scope) =>
      scope.format("NotFound", { EntityId: 10 }, { line: 51 }),
    );
    expect(text).toBe(
      '<E N="50001" M="The Article 10 specified was not found" P="ArticleGet" L="51"><T EntityId="10"/></E>',
    );
  });

  it("re-signals a raised error with thrower context", async () => {
    const { runtime } = createTestRuntime();

    const signal = await rejectionOf(
      runFrame(runtime, { name: "ArticleGet", readOnly: true }, (scope) =>
        scope.raise("NotFound", { EntityId: 10 }, { line: 51 }),
      ),
    );

    expect(signal.message).toBe(RAISED);
    expect(signal.number).toBe(50000);
    expect(signal.procedure).toBe("ErrorHandler");
    expect(signal.line).toBe(51);
  });

  it("appends nodes the body attached before failing", async () => {
    const { runtime } = createTestRuntime();

    const signal = await rejectionOf(
      runFrame(runtime, { name: "ArticleGet", readOnly: true }, (scope) => {
        scope.attach(createAttachmentNode("Rollback", '<Rollback Rows="3"/>'));
        return scope.raise("NotFound", { EntityId: 10 }, { line: 51 });
      }),
    );

    expect(signal.message).toBe(RAISED.replace("</E>", '<Rollback Rows="3"/></E>'));
  });

  it("wraps errors passing through an outer frame", async () => {
    const { runtime } = createTestRuntime();

    const signal = await rejectionOf(
      runFrame(runtime, { name: "ArticleDelete" }, () =>
        runFrame(runtime, { name: "ArticleGet", readOnly: true }, (scope) =>
          scope.raise("NotFound", { EntityId: 10 }, { line: 51 }),
        ),
      ),
    );

    expect(signal.message).toBe(
      '<E N="50001" M="The Article 10 specified was not found" P="ArticleGet" L="51"><T ThrownBy="ArticleGet" ThrownLine="51" DB="testdb" SPID="51"/><T EntityId="10"/><T CalledBy="ArticleDelete" Line="51" DB="testdb" SPID="51"/></E>',
    );
  });

  it("maps host failures thrown by the body", async () => {
    const { runtime } = createTestRuntime();

    const signal = await rejectionOf(
      runFrame(runtime, { name: "ArticleUpdate" }, () => {
        throw new HostFailure(1205, "Transaction was deadlocked", { procedure: "ArticleUpdate", line: 9 });
      }),
    );

    const tree = decodeTree(signal.message);
    expect(tree.code).toBe(1003);
    expect(tree.sourceProcedure).toBe("ArticleUpdate");
    expect(signal.line).toBe(9);
  });

  describe("transactions", () => {
    it("commits a transaction it owns", async () => {
      const { runtime } = createTestRuntime();
      const tx = new FakeTransaction();

      await runFrame(runtime, { name: "ArticleInsert", transaction: tx }, () => "ok");

      expect(tx.begin).toHaveBeenCalledOnce();
      expect(tx.commit).toHaveBeenCalledOnce();
      expect(tx.rollback).not.toHaveBeenCalled();
    });

    it("rolls back a transaction it owns on failure", async () => {
      const { runtime } = createTestRuntime();
      const tx = new FakeTransaction();

      await rejectionOf(
        runFrame(runtime, { name: "ArticleInsert", transaction: tx }, () => {
          throw new HostFailure(2601, "Cannot insert duplicate key row", { procedure: "ArticleInsert" });
        }),
      );

      expect(tx.rollback).toHaveBeenCalledOnce();
      expect(tx.commit).not.toHaveBeenCalled();
    });

    it("leaves a joined transaction to its owner", async () => {
      const { runtime } = createTestRuntime();
      const tx = new FakeTransaction({ active: true });

      await runFrame(runtime, { name: "ArticleGet", transaction: tx }, () => "ok");
      await rejectionOf(
        runFrame(runtime, { name: "ArticleGet", transaction: tx }, (scope) => scope.raise("NotFound")),
      );

      expect(tx.begin).not.toHaveBeenCalled();
      expect(tx.commit).not.toHaveBeenCalled();
      expect(tx.rollback).not.toHaveBeenCalled();
    });

    it("logs a failed rollback and still re-signals", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const { runtime } = createTestRuntime();
      const tx = new FakeTransaction({ rollbackError: new Error("connection lost") });

      const signal = await rejectionOf(
        runFrame(runtime, { name: "ArticleGet", transaction: tx }, (scope) =>
          scope.raise("NotFound", { EntityId: 10 }, { line: 51 }),
        ),
      );

      expect(signal.message).toBe(RAISED);
      expect(warn).toHaveBeenCalledWith("[frame] Rollback failed in ArticleGet: connection lost");
    });
  });

  describe("audit entries", () => {
    it("records nothing while auditing is off", async () => {
      const { runtime, store } = createTestRuntime();
      await runFrame(runtime, { name: "ArticleGet", readOnly: true }, () => "ok");
      expect(store.insert).not.toHaveBeenCalled();
    });

    it("records input and output of a successful frame", async () => {
      const { runtime, store } = createTestRuntime({ parameters: { AuditReadLog: "yes" } });

      await runFrame(runtime, { name: "ArticleGet", readOnly: true, input: { id: 10 } }, () => ({ title: "t" }));

      expect(store.list()).toEqual([
        {
          id: "1",
          procedureName: "ArticleGet",
          inputData: '{"id":10}',
          outputData: '{"title":"t"}',
          errorMessage: null,
          startTime: TEST_NOW,
          endTime: TEST_NOW,
        },
      ]);
    });

    it("uses the write toggle for frames that are not read-only", async () => {
      const { runtime, store } = createTestRuntime({ parameters: { AuditReadLog: "yes" } });
      await runFrame(runtime, { name: "ArticleDelete" }, () => undefined);
      expect(store.insert).not.toHaveBeenCalled();
    });

    it("records the failure of a frame", async () => {
      const { runtime, store } = createTestRuntime({ parameters: { AuditWriteLog: "1" } });

      const signal = await rejectionOf(
        runFrame(runtime, { name: "ArticleDelete", input: { id: 5 } }, (scope) =>
          scope.raise("IsDeleted", { EntityId: 5 }, { line: 62 }),
        ),
      );

      const [entry] = store.list();
      expect(entry?.errorMessage).toBe(signal.message);
      expect(entry?.outputData).toBeNull();
      expect(entry?.endTime).toEqual(TEST_NOW);
      expect(signal.message).toBe(
        '<E N="50002" M="The Article has been marked as deleted" D="The Article 5 has been marked as deleted" P="ArticleDelete" L="62"><T ThrownBy="ArticleDelete" ThrownLine="62" DB="testdb" SPID="51"/><T EntityId="5"/></E>',
      );
    });

    it("redacts secrets in recorded input", async () => {
      const { runtime, store } = createTestRuntime({ parameters: { AuditWriteLog: "true" } });

      await runFrame(runtime, { name: "ArticleInsert", input: { password: "test-secret" } }, () => "ok");

      expect(store.list()[0]?.inputData).toBe('{"password":"[REDACTED]"}');
    });

    it("reports an unavailable audit store as a system error", async () => {
      const { runtime, store } = createTestRuntime({ parameters: { AuditWriteLog: "yes" } });
      store.failInsert = new Error("disk full");
      const body = vi.fn(() => "ok");

      const signal = await rejectionOf(runFrame(runtime, { name: "ArticleInsert" }, body));

      expect(body).not.toHaveBeenCalled();
      expect(decodeTree(signal.message).userMessage).toBe(
        "Unknown system error on server test-server from database testdb. Audit store insert failed: disk full",
      );
    });
  });
});
