import type { NewStoredTransaction, StoredTransaction } from '../../domain/entities/Transaction.js';

export type StageResult = 'staged' | 'conflict';

/** Work done inside one storage transaction; nothing staged here is visible to others before commit. */
export interface StagingBatch {
  /** True when a committed row, or a row staged earlier in this batch, carries the hash. */
  exists(transactionHash: string): Promise<boolean>;
  /** Resolves 'conflict' when the hash uniqueness constraint rejects the row. */
  stage(transaction: NewStoredTransaction): Promise<StageResult>;
}

export interface StoragePort {
  /** Commits once `work` resolves; rolls every staged row back when it rejects or the commit fails. */
  transaction<T>(work: (batch: StagingBatch) => Promise<T>): Promise<T>;
  findByHash(transactionHash: string): Promise<StoredTransaction | null>;
  countUnprocessed(ownerId: number): Promise<number>;
}
