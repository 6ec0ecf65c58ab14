// src/ingest.ts
import type { IntervalBounds } from './config.js';
import { normalizeColumns } from './columns.js';
import { StorageError, StructuralError } from './errors.js';
import { fingerprint, isAlreadyProcessed } from './fingerprint.js';
import { isBlank, parseDelimited, parseInteger } from './frame.js';
import { getLogger, type Logger } from './logger.js';
import {
  DEFAULT_BATCH_SIZE,
  ingestMeasurements,
  prepareMeasurementFrame,
  type BatchProgress,
  type IngestSummary,
} from './measurements.js';
import { assertMappingComplete, buildStepMapping, buildStepRecord, registerSteps } from './steps.js';
import { withStorageRetry, type IngestionStore } from './store.js';
import {
  DEFAULT_INTERVAL_BOUNDS,
  clampInterval,
  filterByTimeInterval,
  recommendInterval,
  type IntervalRecommendation,
  type TestDataType,
} from './time_filter.js';
import { meanTemperature, temperatureMetricsByStep } from './transform.js';
import type { FileType, RowFrame, StepType } from './types.js';
import { validateFrames, type ValidationResult } from './validation.js';

export interface UploadedFile {
  filename: string;
  content: Uint8Array;
}

export interface ExperimentMetadata {
  name: string;
  operator?: string | null;
  description?: string | null;
  startDate: string; // ISO8601
  cellId: number;
  machineId: number;
}

/** Everything the caller decides for one run; nothing is read from ambient state */
export interface IngestionRequest {
  stepFile: UploadedFile;
  detailFile: UploadedFile;
  /** subset of parsed step numbers; all parsed steps when omitted */
  selectedStepNumbers?: number[];
  nominalCapacity: number;
  experiment: ExperimentMetadata;
  timeIntervalSeconds?: number;
  /** proceed although the validation report is not valid */
  allowInvalid?: boolean;
}

export interface IngestionSettings {
  batchSize: number;
  interval: IntervalBounds;
}

export interface IngestionContext {
  store: IngestionStore;
  logger?: Logger;
  settings?: Partial<IngestionSettings>;
  signal?: AbortSignal;
  onBatch?: (progress: BatchProgress) => void;
}

export type StageState = 'pending' | 'committed' | 'skipped' | 'failed';

export interface IngestionStages {
  experiment: StageState;
  steps: StageState;
  measurements: StageState;
  endDate: StageState;
  processedFiles: StageState;
}

export type RunStatus = 'completed' | 'duplicate' | 'invalid' | 'aborted' | 'cancelled' | 'failed';

export interface FileSummary {
  filename: string;
  hash: string;
  rows: number | null;
  alreadyProcessed: boolean;
}

export interface IngestionRunResult {
  status: RunStatus;
  message: string;
  /** element named by a structural abort */
  missing?: string[];
  experimentId: number | null;
  stages: IngestionStages;
  files: Record<FileType, FileSummary>;
  validation: ValidationResult | null;
  steps: { selected: number[]; registered: number };
  measurements: IngestSummary | null;
  interval: { requested: number; applied: number; rowsBefore: number; rowsAfter: number } | null;
}

function parseUpload(file: UploadedFile, kind: FileType): RowFrame {
  try {
    return normalizeColumns(parseDelimited(file.content));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new StructuralError(`${kind} file "${file.filename}" could not be read: ${reason}`, [file.filename]);
  }
}

/** Unique step numbers of registrable rows, in file order */
export function parsedStepNumbers(stepFrame: RowFrame): number[] {
  const out: number[] = [];
  const seen = new Set<number>();
  for (const row of stepFrame.rows) {
    const n = parseInteger(row.step_number);
    if (n === null || isBlank(row.step_type) || seen.has(n)) continue;
    seen.add(n);
    out.push(n);
  }
  return out;
}

const STAGE_ORDER = ['experiment', 'steps', 'measurements', 'endDate', 'processedFiles'] as const;

function pendingStages(): IngestionStages {
  return { experiment: 'pending', steps: 'pending', measurements: 'pending', endDate: 'pending', processedFiles: 'pending' };
}

function skipPending(stages: IngestionStages): void {
  for (const key of STAGE_ORDER) {
    if (stages[key] === 'pending') stages[key] = 'skipped';
  }
}

// the first stage still pending is the one that was running
function markFailed(stages: IngestionStages): void {
  const running = STAGE_ORDER.find((key) => stages[key] === 'pending');
  if (running) stages[running] = 'failed';
}

/**
 * One ingestion run for a step/detail file pair: dedup gate, parse and
 * normalize, validation, experiment, steps + mapping, optional
 * downsampling, measurement batches, end date, processed-file ledger.
 * Stages commit one after another; the result says which of them did.
 */
export async function runIngestion(req: IngestionRequest, ctx: IngestionContext): Promise<IngestionRunResult> {
  const { store } = ctx;
  const logger = ctx.logger ?? getLogger();
  const batchSize = ctx.settings?.batchSize ?? DEFAULT_BATCH_SIZE;
  const bounds = ctx.settings?.interval ?? DEFAULT_INTERVAL_BOUNDS;

  const stages = pendingStages();
  const files: Record<FileType, FileSummary> = {
    step: { filename: req.stepFile.filename, hash: fingerprint(req.stepFile.content), rows: null, alreadyProcessed: false },
    detail: { filename: req.detailFile.filename, hash: fingerprint(req.detailFile.content), rows: null, alreadyProcessed: false },
  };
  const result: IngestionRunResult = {
    status: 'failed',
    message: '',
    experimentId: null,
    stages,
    files,
    validation: null,
    steps: { selected: [], registered: 0 },
    measurements: null,
    interval: null,
  };
  const finish = (status: RunStatus, message: string): IngestionRunResult => {
    skipPending(stages);
    result.status = status;
    result.message = message;
    return result;
  };

  // dedup gate
  files.step.alreadyProcessed = await isAlreadyProcessed(store, files.step.hash, logger);
  files.detail.alreadyProcessed = await isAlreadyProcessed(store, files.detail.hash, logger);
  if (files.step.alreadyProcessed || files.detail.alreadyProcessed) {
    logger.warn({ step: files.step.hash, detail: files.detail.hash }, 'files already processed, skipping');
    return finish('duplicate', 'one or both files have already been processed');
  }

  try {
    const stepFrame = parseUpload(req.stepFile, 'step');
    const detailFrame = parseUpload(req.detailFile, 'detail');
    files.step.rows = stepFrame.rows.length;
    files.detail.rows = detailFrame.rows.length;

    const validation = validateFrames(stepFrame, detailFrame);
    result.validation = validation;
    if (!validation.valid && !req.allowInvalid) {
      const missing = [...validation.step.missing_columns, ...validation.detail.missing_columns];
      result.missing = missing;
      return finish(
        'invalid',
        missing.length ? `validation failed, missing column(s): ${missing.join(', ')}` : 'validation failed: a file has no rows'
      );
    }

    // undefined selects every parsed step; an explicit empty selection selects nothing
    if (req.selectedStepNumbers && !req.selectedStepNumbers.length) {
      throw new StructuralError('no steps selected', ['selectedStepNumbers']);
    }
    const selected = req.selectedStepNumbers ? [...new Set(req.selectedStepNumbers)] : parsedStepNumbers(stepFrame);
    const selectedSet = new Set(selected);
    result.steps.selected = selected;
    const stepRows = req.selectedStepNumbers
      ? stepFrame.rows.filter((row) => {
          const n = parseInteger(row.step_number);
          return n !== null && selectedSet.has(n);
        })
      : stepFrame.rows;

    // structural checks that must pass before anything is written
    prepareMeasurementFrame(detailFrame);
    const requested = req.timeIntervalSeconds ?? 0;
    const applied = clampInterval(requested, bounds);

    const filtered = filterByTimeInterval(detailFrame, applied, bounds);
    result.interval = { requested, applied, rowsBefore: detailFrame.rows.length, rowsAfter: filtered.rows.length };

    const cell = await withStorageRetry(store, 'cells.select', () => store.getCell(req.experiment.cellId), logger);
    const experiment = await withStorageRetry(
      store,
      'experiments.insert',
      () =>
        store.createExperiment({
          name: req.experiment.name,
          description: req.experiment.description ?? null,
          operator: req.experiment.operator ?? null,
          battery_type: cell?.chemistry ?? 'Unknown',
          nominal_capacity: req.nominalCapacity,
          temperature_avg: meanTemperature(detailFrame),
          start_date: req.experiment.startDate,
          end_date: null,
          validation_status: validation.valid,
          validation_report: validation,
          cell_id: req.experiment.cellId,
          machine_id: req.experiment.machineId,
        }),
      logger
    );
    stages.experiment = 'committed';
    result.experimentId = experiment.id;
    logger.info({ experimentId: experiment.id, name: experiment.name }, 'experiment created');

    const steps = await registerSteps(store, experiment.id, stepRows, req.nominalCapacity, {
      temperatures: temperatureMetricsByStep(detailFrame),
      logger,
    });
    stages.steps = steps.length ? 'committed' : 'skipped';
    result.steps.registered = steps.length;

    const mapping = buildStepMapping(steps);
    assertMappingComplete(mapping, selected);

    const summary = await ingestMeasurements(store, experiment.id, filtered, mapping, {
      batchSize,
      signal: ctx.signal,
      onBatch: ctx.onBatch,
      logger,
    });
    result.measurements = summary;
    if (summary.batches === 0) stages.measurements = 'skipped';
    else stages.measurements = summary.failedBatches === summary.batches ? 'failed' : 'committed';
    if (summary.cancelled) {
      return finish('cancelled', `ingestion cancelled after ${summary.batches} batch(es)`);
    }

    const endDate = summary.lastTimestamp;
    if (endDate) {
      try {
        await withStorageRetry(store, 'experiments.update', () => store.updateExperimentEndDate(experiment.id, endDate), logger);
        stages.endDate = 'committed';
      } catch (e) {
        stages.endDate = 'failed';
        logger.warn({ experimentId: experiment.id, err: e instanceof Error ? e.message : String(e) }, 'could not set end date');
      }
    } else {
      stages.endDate = 'skipped';
    }

    // the dedup ledger is written only once every batch has committed
    if (summary.failedBatches > 0) {
      logger.error(
        { experimentId: experiment.id, failedBatches: summary.failedBatches, batches: summary.batches },
        'measurement batches failed, files not recorded as processed'
      );
      return finish(
        'failed',
        `${summary.failedBatches} of ${summary.batches} measurement batch(es) failed: saved ${summary.saved}, ${summary.errors} error(s)`
      );
    }

    const ledger = (['step', 'detail'] as const).map((kind) => ({
      experiment_id: experiment.id,
      filename: files[kind].filename,
      file_type: kind,
      file_hash: files[kind].hash,
      row_count: files[kind].rows ?? 0,
      data_meta: { size_bytes: (kind === 'step' ? req.stepFile : req.detailFile).content.byteLength },
    }));
    await withStorageRetry(store, 'processed_files.insert', () => store.insertProcessedFiles(ledger), logger);
    stages.processedFiles = 'committed';

    logger.info({ experimentId: experiment.id, saved: summary.saved, errors: summary.errors }, 'ingestion completed');
    return finish('completed', `saved ${summary.saved} measurement(s), ${summary.errors} error(s)`);
  } catch (e) {
    if (e instanceof StructuralError) {
      result.missing = e.missing;
      logger.error({ experimentId: result.experimentId, err: e.message }, 'ingestion aborted');
      return finish('aborted', e.message);
    }
    markFailed(stages);
    const message = e instanceof Error ? e.message : String(e);
    logger.error({ experimentId: result.experimentId, err: message }, 'ingestion failed');
    if (e instanceof StorageError || result.experimentId !== null) return finish('failed', message);
    throw e;
  }
}

/** --- pre-ingestion preview --- */

export interface StepPreview {
  step_number: number;
  step_type: StepType;
  original_step_type: string;
  duration: number | null;
  measurement_count: number;
}

export interface InspectionResult {
  files: Record<FileType, FileSummary>;
  validation: ValidationResult;
  steps: StepPreview[];
  recommendation: IntervalRecommendation;
}

/** Everything a caller needs to pick steps and an interval; writes nothing */
export async function inspectUpload(
  store: IngestionStore,
  stepFile: UploadedFile,
  detailFile: UploadedFile,
  options: { dataType?: TestDataType; logger?: Logger } = {}
): Promise<InspectionResult> {
  const logger = options.logger ?? getLogger();
  const stepHash = fingerprint(stepFile.content);
  const detailHash = fingerprint(detailFile.content);
  const stepFrame = parseUpload(stepFile, 'step');
  const detailFrame = parseUpload(detailFile, 'detail');

  const counts = new Map<number, number>();
  for (const row of detailFrame.rows) {
    const n = parseInteger(row.step_number);
    if (n !== null) counts.set(n, (counts.get(n) ?? 0) + 1);
  }

  const steps: StepPreview[] = [];
  const seen = new Set<number>();
  for (const row of stepFrame.rows) {
    // experiment id 0: preview only, never stored
    const record = buildStepRecord(0, row, 0);
    if (!record || seen.has(record.step_number)) continue;
    seen.add(record.step_number);
    steps.push({
      step_number: record.step_number,
      step_type: record.step_type,
      original_step_type: record.original_step_type,
      duration: record.duration,
      measurement_count: counts.get(record.step_number) ?? 0,
    });
  }

  return {
    files: {
      step: {
        filename: stepFile.filename,
        hash: stepHash,
        rows: stepFrame.rows.length,
        alreadyProcessed: await isAlreadyProcessed(store, stepHash, logger),
      },
      detail: {
        filename: detailFile.filename,
        hash: detailHash,
        rows: detailFrame.rows.length,
        alreadyProcessed: await isAlreadyProcessed(store, detailHash, logger),
      },
    },
    validation: validateFrames(stepFrame, detailFrame),
    steps,
    recommendation: recommendInterval(detailFrame.rows.length, options.dataType),
  };
}
