import crypto from 'node:crypto';
import type { IngestionSource, TimestampLike } from '../entities/Transaction.js';

export interface TransactionHashInput {
  date: TimestampLike | null;
  amount: TimestampLike | null;
  merchant: string | null;
  source: IngestionSource;
}

const asKeyPart = (value: TimestampLike | null): string => (value === null ? '' : String(value));

/**
 * Dedup identity of a transaction. Only date, amount, merchant and source take part:
 * category, description and external id differences describe the same economic event.
 */
export const buildTransactionHash = (input: TransactionHashInput): string => {
  const serialized = [
    asKeyPart(input.date),
    asKeyPart(input.amount),
    asKeyPart(input.merchant),
    asKeyPart(input.source),
  ].join('|');

  return crypto.createHash('sha256').update(serialized, 'utf8').digest('hex');
};
