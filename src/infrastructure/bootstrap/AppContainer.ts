import type { HttpClientPort } from '../../application/ports/HttpClientPort.js';
import type { LoggerPort } from '../../application/ports/LoggerPort.js';
import { consoleLogger } from '../../application/ports/LoggerPort.js';
import type { SourceReaderPort } from '../../application/ports/SourceReaderPort.js';
import type { StoragePort } from '../../application/ports/StoragePort.js';
import { BatchLoader } from '../../application/services/BatchLoader.js';
import { IngestionService } from '../../application/services/IngestionService.js';
import { DefaultSourceReaders } from '../adapters/reader/DefaultSourceReaders.js';
import { JsonApiFetcher } from '../adapters/reader/JsonApiFetcher.js';
import { InMemoryStorageAdapter } from '../adapters/storage/InMemoryStorageAdapter.js';
import { PostgresStorageAdapter } from '../adapters/storage/PostgresStorageAdapter.js';
import type { AppConfig } from '../config/Config.js';
import { loadConfig } from '../config/Config.js';
import { FetchTransport } from '../http/FetchTransport.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  storage?: StoragePort;
  http?: HttpClientPort;
  readers?: SourceReaderPort;
  logger?: LoggerPort;
  clock?: () => Date;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly logger: LoggerPort;
  readonly storage: StoragePort;
  readonly http: HttpClientPort;
  readonly readers: SourceReaderPort;
  readonly batchLoader: BatchLoader;
  readonly ingestionService: IngestionService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.logger = overrides.logger ?? consoleLogger;
    this.storage = overrides.storage ?? this.createStorage();
    this.http = overrides.http ?? new FetchTransport();
    this.readers =
      overrides.readers ?? new DefaultSourceReaders(new JsonApiFetcher(this.http, this.config.ingestion.apiTimeoutMs));

    this.batchLoader = new BatchLoader(
      this.storage,
      { currency: this.config.ingestion.defaultCurrency, clock: overrides.clock },
      this.logger,
    );
    this.ingestionService = new IngestionService(this.readers, this.batchLoader, this.storage);
  }

  private createStorage(): StoragePort {
    const { driver, databaseUrl } = this.config.storage;

    if (driver === 'postgres' && databaseUrl) {
      return PostgresStorageAdapter.fromConnectionString(databaseUrl);
    }

    return new InMemoryStorageAdapter();
  }
}
