import { FakeTransaction } from "@faultline/test-utils";
import { describe, expect, it } from "vitest";
import { enterTransaction } from "../../index.js";

describe("TransactionGuard", () => {
  it("owns and begins a transaction when none is active", async () => {
    const tx = new FakeTransaction();
    const guard = await enterTransaction(tx);

    expect(guard.owned).toBe(true);
    expect(tx.begin).toHaveBeenCalledOnce();

    await guard.commit();
    expect(tx.commit).toHaveBeenCalledOnce();
    expect(tx.isActive()).toBe(false);
  });

  it("joins an active transaction without touching it", async () => {
    const tx = new FakeTransaction({ active: true });
    const guard = await enterTransaction(tx);

    expect(guard.owned).toBe(false);
    await guard.commit();
    expect(await guard.rollback()).toBe(false);

    expect(tx.begin).not.toHaveBeenCalled();
    expect(tx.commit).not.toHaveBeenCalled();
    expect(tx.rollback).not.toHaveBeenCalled();
  });

  it("rolls back an owned transaction once", async () => {
    const tx = new FakeTransaction();
    const guard = await enterTransaction(tx);

    expect(await guard.rollback()).toBe(true);
    expect(await guard.rollback()).toBe(false);
    expect(tx.rollback).toHaveBeenCalledOnce();
  });

  it("propagates rollback failures", async () => {
    const tx = new FakeTransaction({ rollbackError: new Error("connection lost") });
    const guard = await enterTransaction(tx);
    await expect(guard.rollback()).rejects.toThrow("connection lost");
  });
});
