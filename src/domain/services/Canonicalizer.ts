import type {
  CanonicalTransaction,
  IngestionSource,
  JsonValue,
  RawRecord,
  TimestampLike,
} from '../entities/Transaction.js';
import { buildTransactionHash } from './TransactionHasher.js';

export type CanonicalField = 'date' | 'amount' | 'merchant' | 'category' | 'description' | 'externalId';

// Case-sensitive; earlier candidates win. Extend a list to teach the pipeline a new source vocabulary.
export const FIELD_CANDIDATES: Readonly<Record<CanonicalField, readonly string[]>> = {
  date: ['date', 'Date', 'created_at', 'timestamp', 'Дата', 'created_time', 'created_datetime', 'time'],
  amount: ['amount', 'Amount', 'Сумма', 'value'],
  merchant: ['merchant', 'Merchant', 'recipient', 'payee', 'Получатель'],
  category: ['category', 'Category', 'Категория'],
  description: ['description', 'Description', 'note', 'Описание'],
  externalId: ['id', 'transaction_id', 'payment_id', 'external_id'],
};

const RAW_PAYLOAD_KEY = 'raw_payload';

const isPresent = (value: JsonValue | undefined): value is Exclude<JsonValue, null> =>
  value !== undefined && value !== null && value !== '';

export const isJsonObject = (value: unknown): value is RawRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** First candidate key holding a present value, or undefined when none does. */
export const resolveFirstPresent = (
  raw: RawRecord,
  candidates: readonly string[],
): Exclude<JsonValue, null> | undefined => {
  for (const key of candidates) {
    if (!Object.prototype.hasOwnProperty.call(raw, key)) {
      continue;
    }

    const value = raw[key];
    if (isPresent(value)) {
      return value;
    }
  }

  return undefined;
};

const toText = (value: JsonValue | undefined): string | null => {
  if (value === undefined || value === null) {
    return null;
  }

  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  return JSON.stringify(value);
};

const toTimestampLike = (value: JsonValue | undefined): TimestampLike | null => {
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }

  return toText(value);
};

/**
 * Items of an API array are not guaranteed to be objects. Wrapping the odd ones keeps
 * them in the batch, where they fail staging as a row error instead of sinking the call.
 */
export const asRawRecord = (value: JsonValue): RawRecord =>
  isJsonObject(value) ? value : { [RAW_PAYLOAD_KEY]: value };

export const canonicalize = (raw: RawRecord, source: IngestionSource): CanonicalTransaction => {
  const pick = (field: CanonicalField) => resolveFirstPresent(raw, FIELD_CANDIDATES[field]);

  const fields = {
    date: toTimestampLike(pick('date')),
    amount: toTimestampLike(pick('amount')),
    merchant: toText(pick('merchant')),
    category: toText(pick('category')),
    description: toText(pick('description')),
    externalId: toText(pick('externalId')),
    rawPayload: Object.prototype.hasOwnProperty.call(raw, RAW_PAYLOAD_KEY) ? raw[RAW_PAYLOAD_KEY] : raw,
    source,
  };

  return Object.freeze({
    ...fields,
    transactionHash: buildTransactionHash(fields),
  });
};
