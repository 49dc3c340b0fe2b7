import type { IngestionSource, JsonObject, RawRecord } from '../../domain/entities/Transaction.js';
import { Sources } from '../../domain/entities/Transaction.js';
import { asRawRecord, canonicalize } from '../../domain/services/Canonicalizer.js';
import type { IngestionSummaryDTO, PipelineStatusDTO } from '../dto/LoadResultDTO.js';
import type { SourceReaderPort } from '../ports/SourceReaderPort.js';
import type { StoragePort } from '../ports/StoragePort.js';
import type { BatchLoader } from './BatchLoader.js';

interface OwnerContext {
  ownerId: number;
  accountId?: number | null;
}

export interface IngestCsvParams extends OwnerContext {
  content: Uint8Array;
  source?: IngestionSource;
}

export interface IngestApiParams extends OwnerContext {
  url: string;
  headers?: Record<string, string>;
  params?: Record<string, string | number | boolean>;
  source?: IngestionSource;
}

export interface IngestWebhookParams extends OwnerContext {
  payload: JsonObject;
  eventType: string;
}

export class IngestionService {
  constructor(
    private readonly readers: SourceReaderPort,
    private readonly loader: BatchLoader,
    private readonly storage: StoragePort,
  ) {}

  async ingestFromCSV(params: IngestCsvParams): Promise<IngestionSummaryDTO> {
    const rows = this.readers.readDelimitedText(params.content);
    return this.ingest(rows, params.source ?? Sources.CSV, params);
  }

  async ingestFromAPI(params: IngestApiParams): Promise<IngestionSummaryDTO> {
    const items = await this.readers.fetchApiRecords({
      url: params.url,
      headers: params.headers ?? {},
      params: params.params,
    });
    const rows = items.map(asRawRecord);
    return this.ingest(rows, params.source ?? Sources.API, params);
  }

  async ingestFromWebhook(params: IngestWebhookParams): Promise<IngestionSummaryDTO> {
    const row = this.readers.translateWebhook(params.payload, params.eventType);
    return this.ingest([row], Sources.UZUM_WEBHOOK, params);
  }

  async getPipelineStatus(ownerId: number): Promise<PipelineStatusDTO> {
    const unprocessedTransactions = await this.storage.countUnprocessed(ownerId);

    return {
      ownerId,
      unprocessedTransactions,
      needsProcessing: unprocessedTransactions > 0,
    };
  }

  private async ingest(rows: RawRecord[], source: IngestionSource, owner: OwnerContext): Promise<IngestionSummaryDTO> {
    const transactions = rows.map((row) => canonicalize(row, source));
    const result = await this.loader.load(transactions, {
      ownerId: owner.ownerId,
      accountId: owner.accountId ?? null,
    });

    return { total: rows.length, ...result };
  }
}
