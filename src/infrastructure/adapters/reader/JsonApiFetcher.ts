import type { HttpClientPort, HttpResponse } from '../../../application/ports/HttpClientPort.js';
import type { JsonObject, JsonValue } from '../../../domain/entities/Transaction.js';
import { UnexpectedShapeError, UpstreamError, describeError } from '../../../domain/errors/IngestionErrors.js';

export const DEFAULT_API_TIMEOUT_MS = 30_000;

export interface ApiFetchParams {
  url: string;
  headers: Record<string, string>;
  params?: Record<string, string | number | boolean>;
}

const isObject = (value: JsonValue | undefined): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const nonEmptyArray = (value: JsonValue | undefined): JsonValue[] | null =>
  Array.isArray(value) && value.length > 0 ? value : null;

/** Locates the record list in the handful of envelope shapes transaction APIs use. */
export const normalizeApiResponse = (body: JsonValue): JsonValue[] => {
  if (Array.isArray(body)) {
    return body;
  }

  if (isObject(body)) {
    const result = body.result;

    return (
      nonEmptyArray(body.data) ??
      nonEmptyArray(body.transactions) ??
      (isObject(result) ? nonEmptyArray(result.transactions) : null) ??
      []
    );
  }

  throw new UnexpectedShapeError(`Unexpected API response type: ${body === null ? 'null' : typeof body}`);
};

export class JsonApiFetcher {
  constructor(
    private readonly http: HttpClientPort,
    private readonly timeoutMs: number = DEFAULT_API_TIMEOUT_MS,
  ) {}

  async fetchRecords(input: ApiFetchParams): Promise<JsonValue[]> {
    let response: HttpResponse;

    try {
      response = await this.http.get({
        url: input.url,
        headers: input.headers,
        params: input.params,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      throw new UpstreamError(`Request to ${input.url} failed: ${describeError(error)}`, undefined, { cause: error });
    }

    if (response.status < 200 || response.status >= 300) {
      throw new UpstreamError(`Request to ${input.url} returned HTTP ${response.status}`, response.status);
    }

    let body: JsonValue;
    try {
      body = JSON.parse(response.text);
    } catch (error) {
      throw new UnexpectedShapeError(`Response from ${input.url} is not JSON`, { cause: error });
    }

    return normalizeApiResponse(body);
  }
}
