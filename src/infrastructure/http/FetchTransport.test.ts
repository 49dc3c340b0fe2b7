import { afterEach, describe, expect, it, vi } from 'vitest';
import { FetchTransport, buildRequestUrl } from './FetchTransport.js';

describe('buildRequestUrl', () => {
  it('returns the url untouched without params', () => {
    expect(buildRequestUrl('https://bank.example.test/tx?page=1')).toBe('https://bank.example.test/tx?page=1');
    expect(buildRequestUrl('https://bank.example.test/tx', {})).toBe('https://bank.example.test/tx');
  });

  it('appends params to the query string', () => {
    expect(buildRequestUrl('https://bank.example.test/tx?page=1', { from: '2025-01-01', limit: 50, all: true })).toBe(
      'https://bank.example.test/tx?page=1&from=2025-01-01&limit=50&all=true',
    );
  });
});

describe('FetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends a JSON GET and returns status and body text', async () => {
    const fetchMock = vi.fn(async () => new Response('{"data":[]}', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const response = await new FetchTransport().get({
      url: 'https://bank.example.test/tx',
      headers: { Authorization: 'Bearer test-token' },
      params: { from: '2025-01-01' },
      timeoutMs: 1000,
    });

    expect(response).toEqual({ status: 200, text: '{"data":[]}' });
    expect(fetchMock).toHaveBeenCalledWith('https://bank.example.test/tx?from=2025-01-01', {
      method: 'GET',
      headers: { Accept: 'application/json', Authorization: 'Bearer test-token' },
      signal: expect.any(AbortSignal),
    });
  });

  it('passes non-2xx responses through', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('nope', { status: 404 })));

    const response = await new FetchTransport().get({ url: 'https://bank.example.test/tx', headers: {}, timeoutMs: 1000 });

    expect(response).toEqual({ status: 404, text: 'nope' });
  });
});
