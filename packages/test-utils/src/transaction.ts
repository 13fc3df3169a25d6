import type { TransactionContext } from "@faultline/core";
import { vi } from "vitest";

export interface FakeTransactionOptions {
  /** Start with a transaction already open, as an outer frame would */
  readonly active?: boolean;
  readonly commitError?: Error;
  readonly rollbackError?: Error;
}

/**
 * Spy-based TransactionContext that tracks whether a transaction is open.
 *
 * @example
 * ```typescript
 * const tx = new FakeTransaction();
 * await runFrame(runtime, { name: "ArticleInsert", transaction: tx }, body);
 * expect(tx.commit).toHaveBeenCalledOnce();
 * ```
 */
export class FakeTransaction implements TransactionContext {
  private active: boolean;

  readonly isActive = vi.fn(() => this.active);

  readonly begin = vi.fn(async () => {
    this.active = true;
  });

  readonly commit = vi.fn(async () => {
    if (this.options.commitError !== undefined) {
      throw this.options.commitError;
    }
    this.active = false;
  });

  readonly rollback = vi.fn(async () => {
    if (this.options.rollbackError !== undefined) {
      throw this.options.rollbackError;
    }
    this.active = false;
  });

  constructor(private readonly options: FakeTransactionOptions = {}) {
    this.active = options.active ?? false;
  }

  reset(): void {
    this.isActive.mockClear();
    this.begin.mockClear();
    this.commit.mockClear();
    this.rollback.mockClear();
  }
}
