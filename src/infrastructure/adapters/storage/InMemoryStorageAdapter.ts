import type { NewStoredTransaction, StoredTransaction } from '../../../domain/entities/Transaction.js';
import type { StageResult, StagingBatch, StoragePort } from '../../../application/ports/StoragePort.js';

/**
 * Process-local store. Batches stage into their own buffer and publish on commit, so a
 * rejected batch leaves nothing behind. Staging reserves the hash across batches, which
 * plays the unique constraint: a second batch staging the same hash gets 'conflict'.
 */
export class InMemoryStorageAdapter implements StoragePort {
  private readonly transactions = new Map<string, StoredTransaction>();
  private readonly reserved = new Set<string>();
  private nextId = 1;

  async transaction<T>(work: (batch: StagingBatch) => Promise<T>): Promise<T> {
    const staged = new Map<string, NewStoredTransaction>();

    const batch: StagingBatch = {
      exists: async (transactionHash) => this.transactions.has(transactionHash) || staged.has(transactionHash),
      stage: async (transaction): Promise<StageResult> => {
        const hash = transaction.transactionHash;
        if (this.transactions.has(hash) || this.reserved.has(hash)) {
          return 'conflict';
        }

        this.reserved.add(hash);
        staged.set(hash, transaction);
        return 'staged';
      },
    };

    try {
      const result = await work(batch);
      this.commit(staged);
      return result;
    } finally {
      for (const hash of staged.keys()) {
        this.reserved.delete(hash);
      }
    }
  }

  async findByHash(transactionHash: string): Promise<StoredTransaction | null> {
    return this.transactions.get(transactionHash) ?? null;
  }

  async countUnprocessed(ownerId: number): Promise<number> {
    let count = 0;

    for (const txn of this.transactions.values()) {
      if (txn.ownerId === ownerId && !txn.processed) {
        count += 1;
      }
    }

    return count;
  }

  list(): StoredTransaction[] {
    return Array.from(this.transactions.values()).sort((a, b) => a.id - b.id);
  }

  private commit(staged: Map<string, NewStoredTransaction>): void {
    for (const [hash, txn] of staged) {
      this.transactions.set(hash, { ...txn, id: this.nextId++, updatedAt: null });
    }
  }
}
