import type { Transaction } from "./types";

export const DEFAULT_MEMPOOL_CAPACITY = 10_000;

export type AdmitResult = "added" | "duplicate" | "full";

/** Pending transactions in arrival order, keyed by id. */
export class Mempool {
  private txs = new Map<string, Transaction>();

  constructor(readonly capacity = DEFAULT_MEMPOOL_CAPACITY) {}

  add(tx: Transaction): AdmitResult {
    if (this.txs.has(tx.id)) return "duplicate";
    if (this.txs.size >= this.capacity) return "full";
    this.txs.set(tx.id, tx);
    return "added";
  }

  has(id: string): boolean {
    return this.txs.has(id);
  }

  all(): Transaction[] {
    return Array.from(this.txs.values());
  }

  size(): number {
    return this.txs.size;
  }

  /** Removes and returns up to `max` of the oldest transactions. */
  take(max: number): Transaction[] {
    const batch = this.all().slice(0, max);
    for (const tx of batch) {
      this.txs.delete(tx.id);
    }
    return batch;
  }

  /** Puts transactions back ahead of everything still pending, ignoring ids already present. */
  requeue(txs: Transaction[]): void {
    const restored = new Map<string, Transaction>();
    for (const tx of txs) {
      if (!this.txs.has(tx.id)) restored.set(tx.id, tx);
    }
    for (const [id, tx] of this.txs) {
      restored.set(id, tx);
    }
    this.txs = restored;
  }

  /**
   * Walks the pool oldest first and drops every transaction `keep` refuses.
   * Returns the dropped transactions.
   */
  retain(keep: (tx: Transaction) => boolean): Transaction[] {
    const dropped: Transaction[] = [];
    for (const tx of this.all()) {
      if (!keep(tx)) {
        this.txs.delete(tx.id);
        dropped.push(tx);
      }
    }
    return dropped;
  }
}
