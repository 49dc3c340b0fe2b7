import { and, count, eq } from 'drizzle-orm';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import type { NewStoredTransaction, StoredTransaction } from '../../../domain/entities/Transaction.js';
import type { StageResult, StagingBatch, StoragePort } from '../../../application/ports/StoragePort.js';
import { transactions } from './schema.js';
import type { TransactionRow } from './schema.js';

const schema = { transactions };

type Database = NodePgDatabase<typeof schema>;

const toStoredTransaction = (row: TransactionRow): StoredTransaction => ({
  id: row.id,
  ownerId: row.ownerId,
  accountId: row.accountId,
  amount: row.amount,
  currency: row.currency,
  merchant: row.merchant,
  category: row.category,
  description: row.description,
  externalId: row.externalId,
  rawPayload: row.rawPayload ?? null,
  source: row.source,
  transactionHash: row.transactionHash,
  processed: row.processed,
  createdAt: row.createdAt,
  ingestedAt: row.ingestedAt,
  updatedAt: row.updatedAt,
});

/**
 * Each batch is one database transaction. Rows are inserted as they are staged, each
 * inside its own savepoint, so a rejected row neither aborts the transaction nor hides
 * its error until commit. ON CONFLICT on the hash index turns a lost race into 'conflict'.
 */
export class PostgresStorageAdapter implements StoragePort {
  private readonly db: Database;

  constructor(private readonly pool: pg.Pool) {
    this.db = drizzle(pool, { schema });
  }

  static fromConnectionString(connectionString: string): PostgresStorageAdapter {
    return new PostgresStorageAdapter(new pg.Pool({ connectionString }));
  }

  async transaction<T>(work: (batch: StagingBatch) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => {
      const staged = new Set<string>();

      const batch: StagingBatch = {
        exists: async (transactionHash) => {
          if (staged.has(transactionHash)) {
            return true;
          }

          const [match] = await tx
            .select({ id: transactions.id })
            .from(transactions)
            .where(eq(transactions.transactionHash, transactionHash))
            .limit(1);

          return match !== undefined;
        },
        stage: async (transaction: NewStoredTransaction): Promise<StageResult> => {
          const inserted = await tx.transaction(async (savepoint) =>
            savepoint
              .insert(transactions)
              .values({ ...transaction, updatedAt: null })
              .onConflictDoNothing({ target: transactions.transactionHash })
              .returning({ id: transactions.id }),
          );

          if (inserted.length === 0) {
            return 'conflict';
          }

          staged.add(transaction.transactionHash);
          return 'staged';
        },
      };

      return work(batch);
    });
  }

  async findByHash(transactionHash: string): Promise<StoredTransaction | null> {
    const row = await this.db.query.transactions.findFirst({
      where: eq(transactions.transactionHash, transactionHash),
    });

    return row ? toStoredTransaction(row) : null;
  }

  async countUnprocessed(ownerId: number): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(transactions)
      .where(and(eq(transactions.ownerId, ownerId), eq(transactions.processed, false)));

    return row?.value ?? 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
