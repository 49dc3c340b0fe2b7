import { ZodError } from 'zod';
import type { CanonicalTransaction, NewStoredTransaction } from '../../domain/entities/Transaction.js';
import { CommitFailure, RowError, describeError } from '../../domain/errors/IngestionErrors.js';
import { parseTransactionDate } from '../../domain/services/TransactionDateParser.js';
import type { LoadResultDTO } from '../dto/LoadResultDTO.js';
import { StagedTransactionSchema } from '../dto/StoredTransactionDTO.js';
import type { LoggerPort } from '../ports/LoggerPort.js';
import { consoleLogger } from '../ports/LoggerPort.js';
import type { StagingBatch, StoragePort } from '../ports/StoragePort.js';

export interface LoadContext {
  ownerId: number;
  accountId?: number | null;
}

export interface BatchLoaderOptions {
  currency: string;
  clock?: () => Date;
}

export type RowOutcome =
  | { kind: 'inserted'; row: number }
  | { kind: 'duplicate'; row: number }
  | { kind: 'failed'; error: RowError };

const describeRowFailure = (error: unknown): string =>
  error instanceof ZodError ? error.issues.map((issue) => issue.message).join('; ') : describeError(error);

export const tallyOutcomes = (outcomes: readonly RowOutcome[]): LoadResultDTO =>
  outcomes.reduce<LoadResultDTO>(
    (result, outcome) => {
      switch (outcome.kind) {
        case 'inserted':
          return { ...result, saved: result.saved + 1 };
        case 'duplicate':
          return { ...result, duplicates: result.duplicates + 1 };
        case 'failed':
          return {
            ...result,
            errors: [...result.errors, { row: outcome.error.row, message: outcome.error.reason }],
          };
      }
    },
    { saved: 0, duplicates: 0, errors: [] },
  );

export class BatchLoader {
  private readonly clock: () => Date;

  constructor(
    private readonly storage: StoragePort,
    private readonly options: BatchLoaderOptions,
    private readonly logger: LoggerPort = consoleLogger,
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async load(transactions: readonly CanonicalTransaction[], context: LoadContext): Promise<LoadResultDTO> {
    const ingestedAt = this.clock();
    let outcomes: RowOutcome[];

    try {
      outcomes = await this.storage.transaction(async (batch) => {
        const results: RowOutcome[] = [];

        for (const [index, transaction] of transactions.entries()) {
          results.push(await this.loadRow(batch, transaction, index + 1, context, ingestedAt));
        }

        return results;
      });
    } catch (error) {
      this.logger.error('Ingestion batch rolled back', {
        ownerId: context.ownerId,
        records: transactions.length,
        error: describeError(error),
      });
      throw new CommitFailure(error);
    }

    const result = tallyOutcomes(outcomes);
    this.logger.info(`Saved ${result.saved} transactions, skipped ${result.duplicates} duplicates`, {
      ownerId: context.ownerId,
      accountId: context.accountId ?? null,
      errors: result.errors.length,
    });

    return result;
  }

  /** Decides one record; never throws, every failure becomes a row-level outcome. */
  async loadRow(
    batch: StagingBatch,
    transaction: CanonicalTransaction,
    row: number,
    context: LoadContext,
    ingestedAt: Date,
  ): Promise<RowOutcome> {
    try {
      if (await batch.exists(transaction.transactionHash)) {
        return { kind: 'duplicate', row };
      }

      const staged = await batch.stage(this.toStoredTransaction(transaction, context, ingestedAt));
      return staged === 'staged' ? { kind: 'inserted', row } : { kind: 'duplicate', row };
    } catch (error) {
      return { kind: 'failed', error: new RowError(row, describeRowFailure(error), { cause: error }) };
    }
  }

  private toStoredTransaction(
    transaction: CanonicalTransaction,
    context: LoadContext,
    ingestedAt: Date,
  ): NewStoredTransaction {
    const checked = StagedTransactionSchema.parse(transaction);

    return {
      ownerId: context.ownerId,
      accountId: context.accountId ?? null,
      amount: checked.amount,
      currency: this.options.currency,
      merchant: checked.merchant,
      category: checked.category,
      description: transaction.description,
      externalId: checked.externalId,
      rawPayload: transaction.rawPayload,
      source: transaction.source,
      transactionHash: checked.transactionHash,
      processed: false,
      createdAt: parseTransactionDate(transaction.date) ?? ingestedAt,
      ingestedAt,
    };
  }
}
