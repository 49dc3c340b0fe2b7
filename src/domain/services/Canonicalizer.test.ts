import { describe, expect, it } from 'vitest';
import { asRawRecord, canonicalize, resolveFirstPresent } from './Canonicalizer.js';
import { buildTransactionHash } from './TransactionHasher.js';

describe('resolveFirstPresent', () => {
  it('returns the value of the first listed key that is present', () => {
    expect(resolveFirstPresent({ Amount: '10', amount: '20' }, ['amount', 'Amount'])).toBe('20');
  });

  it('skips null and empty values', () => {
    expect(resolveFirstPresent({ amount: '', Amount: null, value: 0 }, ['amount', 'Amount', 'value'])).toBe(0);
  });

  it('returns undefined when no candidate matches', () => {
    expect(resolveFirstPresent({ AMOUNT: '5' }, ['amount', 'Amount'])).toBeUndefined();
  });
});

describe('canonicalize', () => {
  it('maps an English CSV row', () => {
    const raw = {
      date: '2025-01-15',
      amount: '-50000',
      merchant: 'Evos',
      category: 'Food',
      description: 'Lunch',
      id: 'TXN-1',
    };

    const txn = canonicalize(raw, 'csv');

    expect(txn).toEqual({
      date: '2025-01-15',
      amount: '-50000',
      merchant: 'Evos',
      category: 'Food',
      description: 'Lunch',
      externalId: 'TXN-1',
      rawPayload: raw,
      source: 'csv',
      transactionHash: '624a3e4e8712c14eda2f3520d0e7cec348529442874f184ddc5e755879640466',
    });
  });

  it('maps localized column names', () => {
    const txn = canonicalize(
      { Дата: '15.01.2025', Сумма: '-1500000', Получатель: 'MAKRO', Категория: 'Продукты', Описание: 'Покупка' },
      'csv',
    );

    expect(txn.date).toBe('15.01.2025');
    expect(txn.amount).toBe('-1500000');
    expect(txn.merchant).toBe('MAKRO');
    expect(txn.category).toBe('Продукты');
    expect(txn.description).toBe('Покупка');
    expect(txn.externalId).toBeNull();
  });

  it('prefers the first listed candidate when English and localized keys are both present', () => {
    const txn = canonicalize({ Сумма: '-200', amount: '-100', Дата: '16.01.2025', date: '2025-01-15' }, 'csv');

    expect(txn.amount).toBe('-100');
    expect(txn.date).toBe('2025-01-15');
  });

  it('stringifies numeric external ids', () => {
    expect(canonicalize({ payment_id: 123456, amount: 25000 }, 'api').externalId).toBe('123456');
  });

  it('leaves unrecognized fields empty', () => {
    const txn = canonicalize({ foo: 'bar' }, 'api');

    expect(txn.date).toBeNull();
    expect(txn.amount).toBeNull();
    expect(txn.merchant).toBeNull();
    expect(txn.category).toBeNull();
    expect(txn.description).toBeNull();
    expect(txn.externalId).toBeNull();
  });

  it('keeps an existing raw_payload instead of wrapping the record again', () => {
    const payload = { transId: 'U-1', amount: 5000 };
    const txn = canonicalize(
      { date: null, amount: 5000, merchant: 'Uzum Bank', external_id: 'U-1', raw_payload: payload },
      'uzum_webhook',
    );

    expect(txn.rawPayload).toEqual(payload);
    expect(txn.externalId).toBe('U-1');
  });

  it('ignores category, description and external id when fingerprinting', () => {
    const base = { date: '2025-01-15', amount: '-50000', merchant: 'Evos' };
    const first = canonicalize({ ...base, category: 'Food', description: 'Lunch', id: 'A' }, 'csv');
    const second = canonicalize({ ...base, category: 'Dining', note: 'Team lunch', id: 'B' }, 'csv');

    expect(first.transactionHash).toBe(second.transactionHash);
  });

  it('derives the hash from the returned fields and freezes the result', () => {
    const txn = canonicalize({ date: '2025-01-15', amount: -50000, merchant: 'Evos' }, 'csv');

    expect(txn.transactionHash).toBe(buildTransactionHash(txn));
    expect(Object.isFrozen(txn)).toBe(true);
  });
});

describe('asRawRecord', () => {
  it('passes objects through', () => {
    const record = { amount: 1 };
    expect(asRawRecord(record)).toBe(record);
  });

  it('wraps scalars as raw payload', () => {
    expect(asRawRecord(42)).toEqual({ raw_payload: 42 });
  });
});
