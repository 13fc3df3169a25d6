import { SignaledError } from "@faultline/errors";
import { describe, expect, it } from "vitest";
import {
  createTestRuntime,
  FakeTransaction,
  MockAuditStore,
  PACKAGE_NAME,
  rejectionOf,
  TEST_NOW,
  TEST_SESSION,
} from "../index.js";

describe("@faultline/test-utils", () => {
  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@faultline/test-utils");
  });

  describe("FakeTransaction", () => {
    it("tracks begin, commit and rollback", async () => {
      const tx = new FakeTransaction();
      expect(tx.isActive()).toBe(false);
      await tx.begin();
      expect(tx.isActive()).toBe(true);
      await tx.commit();
      expect(tx.isActive()).toBe(false);
      expect(tx.commit).toHaveBeenCalledOnce();
    });

    it("can start active and fail on rollback", async () => {
      const tx = new FakeTransaction({ active: true, rollbackError: new Error("gone") });
      expect(tx.isActive()).toBe(true);
      await expect(tx.rollback()).rejects.toThrow("gone");
    });
  });

  describe("MockAuditStore", () => {
    it("records calls and can fail inserts", async () => {
      const store = new MockAuditStore();
      const id = await store.insert({ procedureName: "A", inputData: null, startTime: TEST_NOW });
      expect(id).toBe("1");
      expect(store.insert).toHaveBeenCalledOnce();

      store.failInsert = new Error("offline");
      await expect(
        store.insert({ procedureName: "B", inputData: null, startTime: TEST_NOW }),
      ).rejects.toThrow("offline");
      expect(store.list()).toHaveLength(1);
    });
  });

  describe("createTestRuntime", () => {
    it("wires the fixed session, clock and parameters", () => {
      const { runtime, store } = createTestRuntime({ parameters: { DebugMode: "yes" } });
      expect(runtime.session).toEqual(TEST_SESSION);
      expect(runtime.clock.now()).toBe(TEST_NOW);
      expect(runtime.parameters.get("DebugMode")).toBe("yes");
      expect(runtime.auditStore).toBe(store);
      expect(runtime.catalog.find("ArticleGet", "NotFound")?.errorId).toBe(50001);
    });
  });

  describe("rejectionOf", () => {
    it("returns the signal a promise rejects with", async () => {
      const signal = new SignaledError("<E/>", { procedure: "ErrorHandler" });
      await expect(rejectionOf(Promise.reject(signal))).resolves.toBe(signal);
    });

    it("fails when the promise resolves", async () => {
      await expect(rejectionOf(Promise.resolve(1))).rejects.toThrow(
        "Expected the frame to fail, but it resolved",
      );
    });

    it("rethrows other errors", async () => {
      await expect(rejectionOf(Promise.reject(new TypeError("boom")))).rejects.toThrow(TypeError);
    });
  });
});
