import { describe, expect, it } from 'vitest';
import { buildTransactionHash } from './TransactionHasher.js';

describe('buildTransactionHash', () => {
  it('hashes the pipe-joined identifying fields with sha256', () => {
    const hash = buildTransactionHash({ date: '2025-01-15', amount: '-50000', merchant: 'Evos', source: 'csv' });

    expect(hash).toBe('624a3e4e8712c14eda2f3520d0e7cec348529442874f184ddc5e755879640466');
  });

  it('writes missing fields as empty strings', () => {
    const hash = buildTransactionHash({ date: null, amount: null, merchant: 'Uzum Bank', source: 'uzum_webhook' });

    expect(hash).toBe('8d355a80cd65018dd53c05c5005e9573c44d34a71d31fb34422f0d4aecba71f3');
  });

  it('uses the string form of numeric values', () => {
    const fromNumber = buildTransactionHash({ date: '2025-01-15', amount: -50000, merchant: 'Evos', source: 'csv' });
    const fromString = buildTransactionHash({ date: '2025-01-15', amount: '-50000', merchant: 'Evos', source: 'csv' });

    expect(fromNumber).toBe(fromString);
  });

  it('separates sources', () => {
    const csv = buildTransactionHash({ date: '2025-01-15', amount: '-50000', merchant: 'Evos', source: 'csv' });
    const api = buildTransactionHash({ date: '2025-01-15', amount: '-50000', merchant: 'Evos', source: 'api' });

    expect(api).toBe('f586c066399e431f174f2627d203b8210b43bc3148e99fbd6911b6dd7291f6ae');
    expect(api).not.toBe(csv);
  });
});
