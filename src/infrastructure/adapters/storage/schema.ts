import { boolean, index, integer, jsonb, numeric, pgTable, serial, text, timestamp, varchar } from 'drizzle-orm/pg-core';
import type { JsonValue } from '../../../domain/entities/Transaction.js';

// users_table and accounts are owned by the account service; only their ids are referenced here.
export const transactions = pgTable(
  'transactions',
  {
    id: serial('id').primaryKey(),
    ownerId: integer('owner_id').notNull(),
    accountId: integer('account_id'),
    amount: numeric('amount', { precision: 15, scale: 2 }).notNull(),
    currency: varchar('currency', { length: 3 }).notNull().default('UZS'),
    merchant: varchar('merchant', { length: 255 }),
    category: varchar('category', { length: 100 }),
    description: text('description'),
    rawPayload: jsonb('raw_payload').$type<JsonValue>(),
    transactionHash: varchar('transaction_hash', { length: 64 }).notNull().unique(),
    processed: boolean('processed').notNull().default(false),
    externalId: varchar('external_id', { length: 255 }),
    source: varchar('source', { length: 50 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    ingestedAt: timestamp('ingested_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }),
  },
  (table) => [
    index('idx_transactions_owner').on(table.ownerId),
    index('idx_transactions_account').on(table.accountId),
    index('idx_transactions_category').on(table.category),
    index('idx_transactions_external_id').on(table.externalId),
    index('idx_owner_processed').on(table.ownerId, table.processed),
    index('idx_owner_date').on(table.ownerId, table.createdAt),
  ],
);

export type TransactionRow = typeof transactions.$inferSelect;
export type NewTransactionRow = typeof transactions.$inferInsert;
