// src/api_v1.ts
import express from 'express';
import { z } from 'zod';
import type { AppConfig } from './config.js';
import { mapErrorToResponse } from './errors.js';
import { inspectUpload, runIngestion, type IngestionRunResult, type RunStatus, type UploadedFile } from './ingest.js';
import type { Logger } from './logger.js';
import type { IngestionStore } from './store.js';
import { TEST_DATA_TYPES, TIME_INTERVAL_PRESETS, recommendInterval } from './time_filter.js';

export interface ApiDeps {
  store: IngestionStore;
  config: AppConfig;
  logger: Logger;
}

/** --- validators --- */
const UploadedFileSchema = z.object({
  filename: z.string().min(1).max(255),
  content_base64: z.string().min(1).base64(),
});

const FilePairSchema = z.object({
  step_file: UploadedFileSchema,
  detail_file: UploadedFileSchema,
  data_type: z.enum(TEST_DATA_TYPES).optional(),
});

const IngestionSchema = z.object({
  step_file: UploadedFileSchema,
  detail_file: UploadedFileSchema,
  selected_step_numbers: z.array(z.number().int()).min(1).max(10_000).optional(),
  nominal_capacity: z.number().min(0),
  experiment: z.object({
    name: z.string().min(1).max(200),
    operator: z.string().max(100).optional().nullable(),
    description: z.string().max(2000).optional().nullable(),
    start_date: z.string().datetime({ offset: true }), // ISO8601
    cell_id: z.number().int().positive(),
    machine_id: z.number().int().positive(),
  }),
  time_interval_sec: z.number().min(0).optional().default(0),
  allow_invalid: z.boolean().optional().default(false),
});

const RecommendationQuery = z.object({
  size: z.coerce.number().int().min(0),
  data_type: z.enum(TEST_DATA_TYPES).optional(),
});

function decode(file: z.infer<typeof UploadedFileSchema>): UploadedFile {
  return { filename: file.filename, content: Buffer.from(file.content_base64, 'base64') };
}

const STATUS_HTTP: Record<RunStatus, number> = {
  completed: 201,
  duplicate: 409,
  invalid: 422,
  aborted: 422,
  cancelled: 200,
  failed: 500,
};

const STATUS_CODE: Record<RunStatus, string> = {
  completed: 'COMPLETED',
  duplicate: 'DUPLICATE_FILE',
  invalid: 'INVALID_FILES',
  aborted: 'STRUCTURAL_ERROR',
  cancelled: 'CANCELLED',
  failed: 'INGESTION_FAILED',
};

function sendRun(res: express.Response, result: IngestionRunResult) {
  const status = STATUS_HTTP[result.status];
  if (status < 400) return res.status(status).json(result);
  return res.status(status).json({ error: { code: STATUS_CODE[result.status], message: result.message, details: result } });
}

export function createApiV1({ store, config, logger }: ApiDeps): express.Router {
  const router = express.Router();

  /** --- simple auth (Bearer) --- */
  function requireAuth(req: express.Request, res: express.Response, next: express.NextFunction) {
    const hdr = req.header('authorization') || '';
    const token = hdr.startsWith('Bearer ') ? hdr.slice(7) : '';
    if (!token || !config.apiKeys.includes(token)) {
      return res.status(401).json({ error: { code: 'UNAUTHORIZED', message: 'Invalid API key' } });
    }
    next();
  }

  function fail(res: express.Response, e: unknown) {
    const { status, body } = mapErrorToResponse(e);
    if (status >= 500) logger.error({ err: e instanceof Error ? e.message : String(e) }, 'request failed');
    return res.status(status).json(body);
  }

  /** health */
  router.get('/healthz', (_req, res) => {
    res.type('application/json').send({ ok: true, ts: new Date().toISOString() });
  });

  /** preview: fingerprints, duplicate flags, validation, steps, interval hint */
  router.post('/uploads/inspect', requireAuth, async (req, res) => {
    try {
      const p = FilePairSchema.parse(req.body);
      const result = await inspectUpload(store, decode(p.step_file), decode(p.detail_file), {
        dataType: p.data_type,
        logger,
      });
      return res.json(result);
    } catch (e) {
      return fail(res, e);
    }
  });

  router.post('/ingestions', requireAuth, async (req, res) => {
    const controller = new AbortController();
    // client gone: stop after the running batch
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const p = IngestionSchema.parse(req.body);
      const result = await runIngestion(
        {
          stepFile: decode(p.step_file),
          detailFile: decode(p.detail_file),
          selectedStepNumbers: p.selected_step_numbers,
          nominalCapacity: p.nominal_capacity,
          experiment: {
            name: p.experiment.name,
            operator: p.experiment.operator ?? null,
            description: p.experiment.description ?? null,
            startDate: p.experiment.start_date,
            cellId: p.experiment.cell_id,
            machineId: p.experiment.machine_id,
          },
          timeIntervalSeconds: p.time_interval_sec,
          allowInvalid: p.allow_invalid,
        },
        {
          store,
          logger,
          settings: { batchSize: config.batchSize, interval: config.interval },
          signal: controller.signal,
        }
      );
      return sendRun(res, result);
    } catch (e) {
      return fail(res, e);
    }
  });

  router.get('/time-interval/presets', requireAuth, (_req, res) => {
    res.json({ presets: TIME_INTERVAL_PRESETS, bounds: config.interval });
  });

  router.get('/time-interval/recommendation', requireAuth, (req, res) => {
    try {
      const q = RecommendationQuery.parse(req.query);
      return res.json(recommendInterval(q.size, q.data_type));
    } catch (e) {
      return fail(res, e);
    }
  });

  return router;
}
