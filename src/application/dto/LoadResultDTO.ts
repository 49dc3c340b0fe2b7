import { z } from 'zod';

export const RowErrorSchema = z.object({
  row: z.number().int().positive(),
  message: z.string(),
});

export type RowErrorDTO = z.infer<typeof RowErrorSchema>;

export const LoadResultSchema = z.object({
  saved: z.number().int().nonnegative(),
  duplicates: z.number().int().nonnegative(),
  errors: z.array(RowErrorSchema),
});

export type LoadResultDTO = z.infer<typeof LoadResultSchema>;

export const IngestionSummarySchema = LoadResultSchema.extend({
  total: z.number().int().nonnegative(),
});

export type IngestionSummaryDTO = z.infer<typeof IngestionSummarySchema>;

export interface PipelineStatusDTO {
  ownerId: number;
  unprocessedTransactions: number;
  needsProcessing: boolean;
}
