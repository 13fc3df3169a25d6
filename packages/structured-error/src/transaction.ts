import type { TransactionContext } from "@faultline/core";

/**
 * Records whether a frame owns the transaction it runs in.
 *
 * A frame owns the transaction only when none was active on entry; it
 * then begins, commits and rolls back. A frame joining an outer
 * transaction leaves all three to its owner.
 */
export class TransactionGuard {
  private constructor(
    private readonly tx: TransactionContext,
    readonly owned: boolean,
  ) {}

  static async enter(tx: TransactionContext): Promise<TransactionGuard> {
    const owned = !tx.isActive();
    if (owned) {
      await tx.begin();
    }
    return new TransactionGuard(tx, owned);
  }

  async commit(): Promise<void> {
    if (this.owned && this.tx.isActive()) {
      await this.tx.commit();
    }
  }

  /** Roll back only an owned transaction that is still active */
  async rollback(): Promise<boolean> {
    if (!this.owned || !this.tx.isActive()) {
      return false;
    }
    await this.tx.rollback();
    return true;
  }
}

export function enterTransaction(tx: TransactionContext): Promise<TransactionGuard> {
  return TransactionGuard.enter(tx);
}
