import cors from 'cors';
import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { z, ZodError } from 'zod';
import { IngestionError, describeError } from './domain/errors/IngestionErrors.js';
import { isJsonObject } from './domain/services/Canonicalizer.js';
import type { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const ownerId = z.coerce.number().int().positive();
const accountId = z.coerce.number().int().positive();

const CsvUploadSchema = z.object({
  ownerId,
  accountId: accountId.optional(),
  source: z.string().min(1).max(50).optional(),
});

const ApiIngestSchema = z.object({
  url: z.string().url(),
  headers: z.record(z.string()).default({}),
  params: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  ownerId,
  accountId,
  source: z.string().min(1).max(50).optional(),
});

const WebhookQuerySchema = z.object({
  ownerId,
  accountId,
  eventType: z.string().min(1).optional(),
});

const StatusQuerySchema = z.object({ ownerId });

export const createApp = (container: AppContainer) => {
  const app = express();
  const { ingestionService, logger } = container;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: 10 * 1024 * 1024, // 10MB max
    },
  });

  app.use(cors({ origin: '*', credentials: false }));
  app.use(express.json({ limit: '2mb' }));

  app.get('/', (_req, res) => {
    res.json({
      name: 'Transaction Ingestion Service',
      status: 'running',
      endpoints: {
        csv: 'POST /api/ingest/csv',
        api: 'POST /api/ingest/api',
        uzumWebhook: 'POST /api/webhooks/uzum',
        status: 'GET /api/ingest/status?ownerId=',
      },
    });
  });

  app.post('/api/ingest/csv', upload.single('file'), async (req, res, next) => {
    try {
      if (!req.file) {
        res.status(400).json({ success: false, error: 'Missing file upload field: file' });
        return;
      }

      const fields = CsvUploadSchema.parse(req.body);
      const summary = await ingestionService.ingestFromCSV({
        content: req.file.buffer,
        ownerId: fields.ownerId,
        accountId: fields.accountId ?? null,
        source: fields.source,
      });

      res.json({ success: true, ...summary });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/ingest/api', async (req, res, next) => {
    try {
      const body = ApiIngestSchema.parse(req.body);
      const summary = await ingestionService.ingestFromAPI(body);

      res.json({ success: true, ...summary });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/webhooks/uzum', async (req, res, next) => {
    try {
      const query = WebhookQuerySchema.parse(req.query);
      const eventType = req.get('x-event-type') ?? query.eventType;
      const payload: unknown = req.body;

      if (!eventType || !isJsonObject(payload)) {
        res.status(400).json({ success: false, error: 'Webhook requires a JSON object body and an event type' });
        return;
      }

      const summary = await ingestionService.ingestFromWebhook({
        payload,
        eventType,
        ownerId: query.ownerId,
        accountId: query.accountId,
      });

      res.json({ success: true, ...summary });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/ingest/status', async (req, res, next) => {
    try {
      const { ownerId: owner } = StatusQuerySchema.parse(req.query);
      res.json(await ingestionService.getPipelineStatus(owner));
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof ZodError) {
      res.status(400).json({
        success: false,
        code: 'VALIDATION_ERROR',
        error: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      });
      return;
    }

    if (error instanceof multer.MulterError) {
      res.status(400).json({ success: false, code: error.code, error: error.message });
      return;
    }

    if (error instanceof IngestionError) {
      if (error.statusCode >= 500) {
        logger.error(error.message, { code: error.code, details: error.details });
      } else {
        logger.warn(error.message, { code: error.code });
      }

      res.status(error.statusCode).json({ success: false, code: error.code, error: error.message });
      return;
    }

    logger.error('Unhandled request error', { error: describeError(error) });
    res.status(500).json({ success: false, error: 'Unknown error' });
  });

  return app;
};
