import type { JsonObject, JsonValue, RawRecord } from '../../domain/entities/Transaction.js';

export interface ApiSourceRequest {
  url: string;
  headers: Record<string, string>;
  params?: Record<string, string | number | boolean>;
}

export interface SourceReaderPort {
  readDelimitedText(bytes: Uint8Array): RawRecord[];
  fetchApiRecords(request: ApiSourceRequest): Promise<JsonValue[]>;
  translateWebhook(payload: JsonObject, eventType: string): RawRecord;
}
