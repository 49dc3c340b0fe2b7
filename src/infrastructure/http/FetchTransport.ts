import type { HttpClientPort, HttpGetRequest, HttpResponse } from '../../application/ports/HttpClientPort.js';

export const buildRequestUrl = (url: string, params?: HttpGetRequest['params']): string => {
  if (!params || Object.keys(params).length === 0) {
    return url;
  }

  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, String(value));
  }

  return target.toString();
};

export class FetchTransport implements HttpClientPort {
  async get(request: HttpGetRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(buildRequestUrl(request.url, request.params), {
        method: 'GET',
        headers: { Accept: 'application/json', ...request.headers },
        signal: controller.signal,
      });

      return { status: response.status, text: await response.text() };
    } finally {
      clearTimeout(timeout);
    }
  }
}
