export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** One decoded source row or payload, keyed by whatever vocabulary the source uses. */
export type RawRecord = JsonObject;

export type TimestampLike = string | number;

export const Sources = {
  CSV: 'csv',
  API: 'api',
  UZUM_WEBHOOK: 'uzum_webhook',
} as const;

export type KnownSource = (typeof Sources)[keyof typeof Sources];

// Callers may pass their own tags (e.g. a bank-specific CSV export).
export type IngestionSource = KnownSource | (string & {});

export interface CanonicalTransaction {
  readonly date: TimestampLike | null;
  readonly amount: TimestampLike | null; // positive = inflow, negative = outflow
  readonly merchant: string | null;
  readonly category: string | null;
  readonly description: string | null;
  readonly externalId: string | null;
  readonly rawPayload: JsonValue;
  readonly source: IngestionSource;
  readonly transactionHash: string;
}

export interface NewStoredTransaction {
  ownerId: number;
  accountId: number | null;
  amount: string;
  currency: string;
  merchant: string | null;
  category: string | null;
  description: string | null;
  externalId: string | null;
  rawPayload: JsonValue;
  source: IngestionSource;
  transactionHash: string;
  processed: boolean;
  createdAt: Date;
  ingestedAt: Date;
}

export interface StoredTransaction extends NewStoredTransaction {
  id: number;
  updatedAt: Date | null;
}
