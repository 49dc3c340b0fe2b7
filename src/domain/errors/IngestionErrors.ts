export const IngestionErrorCodes = {
  DECODE_FAILED: 'DECODE_FAILED',
  UPSTREAM_FAILED: 'UPSTREAM_FAILED',
  UNEXPECTED_SHAPE: 'UNEXPECTED_SHAPE',
  ROW_FAILED: 'ROW_FAILED',
  COMMIT_FAILED: 'COMMIT_FAILED',
} as const;

export type IngestionErrorCode = (typeof IngestionErrorCodes)[keyof typeof IngestionErrorCodes];

export class IngestionError extends Error {
  constructor(
    message: string,
    readonly code: IngestionErrorCode,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'IngestionError';
  }
}

export class DecodeError extends IngestionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, IngestionErrorCodes.DECODE_FAILED, 400, details);
    this.name = 'DecodeError';
  }
}

export class UpstreamError extends IngestionError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, IngestionErrorCodes.UPSTREAM_FAILED, 502, status === undefined ? undefined : { status }, options);
    this.name = 'UpstreamError';
  }
}

export class UnexpectedShapeError extends IngestionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, IngestionErrorCodes.UNEXPECTED_SHAPE, 502, undefined, options);
    this.name = 'UnexpectedShapeError';
  }
}

export class RowError extends IngestionError {
  constructor(
    readonly row: number,
    readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Row ${row}: ${reason}`, IngestionErrorCodes.ROW_FAILED, 422, { row }, options);
    this.name = 'RowError';
  }
}

export class CommitFailure extends IngestionError {
  constructor(cause: unknown) {
    super(
      `Failed to commit ingestion batch: ${describeError(cause)}`,
      IngestionErrorCodes.COMMIT_FAILED,
      500,
      undefined,
      { cause },
    );
    this.name = 'CommitFailure';
  }
}

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
