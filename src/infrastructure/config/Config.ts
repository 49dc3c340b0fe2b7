import { z } from 'zod';

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(4000),
    STORAGE_DRIVER: z.enum(['memory', 'postgres']).default('memory'),
    DATABASE_URL: z.string().min(1).optional(),
    INGEST_API_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    APP_DEFAULT_CURRENCY: z.string().length(3).default('UZS'),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when STORAGE_DRIVER=postgres',
      });
    }
  });

export interface AppConfig {
  storage: {
    driver: 'memory' | 'postgres';
    databaseUrl?: string;
  };
  ingestion: {
    apiTimeoutMs: number;
    defaultCurrency: string;
  };
  app: {
    port: number;
  };
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.parse(env);

  return {
    storage: {
      driver: parsed.STORAGE_DRIVER,
      databaseUrl: parsed.DATABASE_URL,
    },
    ingestion: {
      apiTimeoutMs: parsed.INGEST_API_TIMEOUT_MS,
      defaultCurrency: parsed.APP_DEFAULT_CURRENCY.toUpperCase(),
    },
    app: {
      port: parsed.PORT,
    },
  };
};
