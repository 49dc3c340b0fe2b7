import dayjs from 'dayjs';
import type { JsonObject, JsonValue, RawRecord } from '../../../domain/entities/Transaction.js';
import { Sources } from '../../../domain/entities/Transaction.js';
import { resolveFirstPresent } from '../../../domain/services/Canonicalizer.js';

export const UZUM_MERCHANT_LABEL = 'Uzum Bank';

const TIMESTAMP_FIELDS = ['timestamp', 'transTime', 'confirmTime'] as const;

const toEpochMillis = (value: JsonValue | undefined): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }

  return null;
};

// Finite values outside the Date range are unreadable too.
const toIsoDate = (epochMillis: number | null): string | null => {
  if (epochMillis === null) {
    return null;
  }

  const parsed = dayjs(epochMillis);
  return parsed.isValid() ? parsed.toISOString() : null;
};

/** Converts one Uzum Bank callback into the generic record shape the canonicalizer reads. */
export const translateUzumWebhook = (payload: JsonObject, eventType: string): RawRecord => {
  const epochMillis = toEpochMillis(resolveFirstPresent(payload, TIMESTAMP_FIELDS));

  return {
    date: toIsoDate(epochMillis),
    amount: payload.amount ?? null,
    merchant: UZUM_MERCHANT_LABEL,
    category: null,
    description: `Uzum webhook: ${eventType}`,
    external_id: payload.transId ?? null,
    raw_payload: payload,
    source: Sources.UZUM_WEBHOOK,
  };
};
