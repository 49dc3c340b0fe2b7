import { describe, expect, it, vi } from 'vitest';
import type { HttpClientPort, HttpGetRequest, HttpResponse } from '../../../application/ports/HttpClientPort.js';
import { UnexpectedShapeError, UpstreamError } from '../../../domain/errors/IngestionErrors.js';
import { DEFAULT_API_TIMEOUT_MS, JsonApiFetcher, normalizeApiResponse } from './JsonApiFetcher.js';

const records = [
  { id: 'p-1', amount: 50000, recipient: 'Starbucks' },
  { id: 'p-2', amount: -25000, recipient: 'Korzinka' },
];

const stubHttp = (response: HttpResponse | Error) => {
  const get = vi.fn(async (_request: HttpGetRequest): Promise<HttpResponse> => {
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });
  const http: HttpClientPort = { get };
  return { http, get };
};

describe('normalizeApiResponse', () => {
  it('extracts the same records from every supported envelope', () => {
    expect(normalizeApiResponse(records)).toEqual(records);
    expect(normalizeApiResponse({ data: records })).toEqual(records);
    expect(normalizeApiResponse({ transactions: records })).toEqual(records);
    expect(normalizeApiResponse({ jsonrpc: '2.0', result: { transactions: records } })).toEqual(records);
  });

  it('prefers data over transactions', () => {
    expect(normalizeApiResponse({ data: [records[0]], transactions: [records[1]] })).toEqual([records[0]]);
  });

  it('skips empty lists when looking for records', () => {
    expect(normalizeApiResponse({ data: [], transactions: records })).toEqual(records);
  });

  it('returns an empty list when no known key is present', () => {
    expect(normalizeApiResponse({ foo: 'bar' })).toEqual([]);
  });

  it('rejects scalar bodies', () => {
    expect(() => normalizeApiResponse(42)).toThrow(UnexpectedShapeError);
    expect(() => normalizeApiResponse('ok')).toThrow(UnexpectedShapeError);
    expect(() => normalizeApiResponse(null)).toThrow('Unexpected API response type: null');
  });
});

describe('JsonApiFetcher', () => {
  it('issues one GET with the configured timeout', async () => {
    const { http, get } = stubHttp({ status: 200, text: JSON.stringify({ transactions: records }) });
    const fetcher = new JsonApiFetcher(http);

    const result = await fetcher.fetchRecords({
      url: 'https://bank.example.test/v1/transactions',
      headers: { Authorization: 'Bearer test-token' },
      params: { from: '2025-01-01' },
    });

    expect(result).toEqual(records);
    expect(get).toHaveBeenCalledTimes(1);
    expect(get).toHaveBeenCalledWith({
      url: 'https://bank.example.test/v1/transactions',
      headers: { Authorization: 'Bearer test-token' },
      params: { from: '2025-01-01' },
      timeoutMs: DEFAULT_API_TIMEOUT_MS,
    });
  });

  it('raises UpstreamError carrying the status for non-2xx responses', async () => {
    const { http } = stubHttp({ status: 503, text: 'unavailable' });
    const fetcher = new JsonApiFetcher(http);

    const failure = await fetcher.fetchRecords({ url: 'https://bank.example.test/tx', headers: {} }).catch((e: unknown) => e);

    expect(failure).toBeInstanceOf(UpstreamError);
    expect(failure).toMatchObject({ status: 503, code: 'UPSTREAM_FAILED' });
  });

  it('raises UpstreamError when the transport fails', async () => {
    const { http } = stubHttp(new Error('This operation was aborted'));
    const fetcher = new JsonApiFetcher(http, 10);

    await expect(fetcher.fetchRecords({ url: 'https://bank.example.test/tx', headers: {} })).rejects.toThrow(
      'Request to https://bank.example.test/tx failed: This operation was aborted',
    );
  });

  it('raises UnexpectedShapeError for a non-JSON body', async () => {
    const { http } = stubHttp({ status: 200, text: '<html></html>' });
    const fetcher = new JsonApiFetcher(http);

    await expect(fetcher.fetchRecords({ url: 'https://bank.example.test/tx', headers: {} })).rejects.toBeInstanceOf(
      UnexpectedShapeError,
    );
  });
});
