import type { ApiSourceRequest, SourceReaderPort } from '../../../application/ports/SourceReaderPort.js';
import type { JsonObject, JsonValue, RawRecord } from '../../../domain/entities/Transaction.js';
import { readDelimitedText } from './DelimitedTextReader.js';
import type { JsonApiFetcher } from './JsonApiFetcher.js';
import { translateUzumWebhook } from './UzumWebhookTranslator.js';

export class DefaultSourceReaders implements SourceReaderPort {
  constructor(private readonly apiFetcher: JsonApiFetcher) {}

  readDelimitedText(bytes: Uint8Array): RawRecord[] {
    return readDelimitedText(bytes);
  }

  fetchApiRecords(request: ApiSourceRequest): Promise<JsonValue[]> {
    return this.apiFetcher.fetchRecords(request);
  }

  translateWebhook(payload: JsonObject, eventType: string): RawRecord {
    return translateUzumWebhook(payload, eventType);
  }
}
