export * from './domain/entities/Transaction.js';
export * from './domain/errors/IngestionErrors.js';
export { canonicalize, asRawRecord, resolveFirstPresent, FIELD_CANDIDATES } from './domain/services/Canonicalizer.js';
export type { CanonicalField } from './domain/services/Canonicalizer.js';
export { buildTransactionHash as fingerprint } from './domain/services/TransactionHasher.js';
export { parseTransactionDate } from './domain/services/TransactionDateParser.js';
export type { IngestionSummaryDTO, LoadResultDTO, PipelineStatusDTO, RowErrorDTO } from './application/dto/LoadResultDTO.js';
export type { HttpClientPort, HttpGetRequest, HttpResponse } from './application/ports/HttpClientPort.js';
export type { LoggerPort } from './application/ports/LoggerPort.js';
export type { SourceReaderPort, ApiSourceRequest } from './application/ports/SourceReaderPort.js';
export type { StageResult, StagingBatch, StoragePort } from './application/ports/StoragePort.js';
export { BatchLoader, tallyOutcomes } from './application/services/BatchLoader.js';
export type { LoadContext, RowOutcome } from './application/services/BatchLoader.js';
export { IngestionService } from './application/services/IngestionService.js';
export type { IngestApiParams, IngestCsvParams, IngestWebhookParams } from './application/services/IngestionService.js';
export { readDelimitedText, decodeText, parseDelimitedText } from './infrastructure/adapters/reader/DelimitedTextReader.js';
export { JsonApiFetcher, normalizeApiResponse } from './infrastructure/adapters/reader/JsonApiFetcher.js';
export { translateUzumWebhook } from './infrastructure/adapters/reader/UzumWebhookTranslator.js';
export { InMemoryStorageAdapter } from './infrastructure/adapters/storage/InMemoryStorageAdapter.js';
export { PostgresStorageAdapter } from './infrastructure/adapters/storage/PostgresStorageAdapter.js';
export { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
export { loadConfig } from './infrastructure/config/Config.js';
export type { AppConfig } from './infrastructure/config/Config.js';
export { createApp } from './app.js';
