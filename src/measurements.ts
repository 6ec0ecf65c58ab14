// src/measurements.ts
import { StructuralError } from './errors.js';
import { hasColumn, isBlank, parseInteger, parseNumeric, roundTo } from './frame.js';
import { getLogger, type Logger } from './logger.js';
import { withStorageRetry, type IngestionStore } from './store.js';
import { parseTimestamp } from './time.js';
import type { FrameRow, NewMeasurement, RowFrame, StepMapping } from './types.js';

export const MEASUREMENT_REQUIRED_COLUMNS = ['step_number', 'execution_time', 'voltage', 'current'] as const;

export const DEFAULT_BATCH_SIZE = 1000;
export const DEFAULT_TEMPERATURE = 25.0;

const PRECISION = {
  voltage: 3,
  current: 3,
  capacity: 3,
  energy: 3,
  temperature: 1,
  soc: 1,
} as const;

/**
 * Structural checks before any write: required columns present and every
 * step_number an integer. Returns the coerced join key per row.
 */
export function prepareMeasurementFrame(frame: RowFrame): number[] {
  const missing = MEASUREMENT_REQUIRED_COLUMNS.filter((c) => !hasColumn(frame, c));
  if (missing.length) {
    throw new StructuralError(`detail data is missing required column(s): ${missing.join(', ')}`, [...missing]);
  }

  return frame.rows.map((row, index) => {
    const n = parseInteger(row.step_number);
    if (n === null) {
      throw new StructuralError(
        `step_number "${row.step_number ?? ''}" on detail row ${index + 1} is not an integer`,
        ['step_number']
      );
    }
    return n;
  });
}

// undefined = present but not numeric
function required(value: string | null | undefined): number | undefined {
  return parseNumeric(value) ?? undefined;
}

function optional(value: string | null | undefined, fallback: number | null): number | null | undefined {
  if (isBlank(value)) return fallback;
  return parseNumeric(value) ?? undefined;
}

/** null when a numeric field cannot be coerced */
export function buildMeasurement(row: FrameRow, stepId: number): NewMeasurement | null {
  const executionTime = required(row.execution_time);
  const voltage = required(row.voltage);
  const current = required(row.current);
  const temperature = optional(row.temperature, DEFAULT_TEMPERATURE);
  const capacity = optional(row.capacity, 0);
  const energy = optional(row.energy, 0);
  const soc = optional(row.soc, null);

  if (
    executionTime === undefined ||
    voltage === undefined ||
    current === undefined ||
    temperature === undefined ||
    temperature === null ||
    capacity === undefined ||
    capacity === null ||
    energy === undefined ||
    energy === null ||
    soc === undefined
  ) {
    return null;
  }

  const ts = parseTimestamp(row.timestamp);
  return {
    step_id: stepId,
    execution_time: executionTime,
    timestamp: ts ? ts.toISOString() : null,
    voltage: roundTo(voltage, PRECISION.voltage),
    current: roundTo(current, PRECISION.current),
    temperature: roundTo(temperature, PRECISION.temperature),
    capacity: roundTo(capacity, PRECISION.capacity),
    energy: roundTo(energy, PRECISION.energy),
    soc: soc === null ? null : roundTo(soc, PRECISION.soc),
  };
}

export interface BatchProgress {
  batch: number;
  totalBatches: number;
  saved: number;
  errors: number;
  skipped: number;
}

export interface IngestMeasurementsOptions {
  batchSize?: number;
  /** Aborting stops further batches; the running one completes */
  signal?: AbortSignal;
  onBatch?: (progress: BatchProgress) => void;
  logger?: Logger;
}

export interface IngestSummary {
  total: number;
  saved: number;
  /** rows that failed coercion plus rows of batches that failed to commit */
  errors: number;
  /** rows of steps outside the mapping; not errors */
  skipped: number;
  batches: number;
  failedBatches: number;
  cancelled: boolean;
  /** latest timestamp among committed rows */
  lastTimestamp: string | null;
}

/**
 * Writes the detail rows of one experiment in independently committed
 * batches. A failed batch costs only its own rows; batches already
 * committed stay. Throws only for structural problems.
 */
export async function ingestMeasurements(
  store: IngestionStore,
  experimentId: number,
  frame: RowFrame,
  stepMapping: StepMapping,
  options: IngestMeasurementsOptions = {}
): Promise<IngestSummary> {
  const logger = options.logger ?? getLogger();
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const stepNumbers = prepareMeasurementFrame(frame);
  const total = frame.rows.length;
  const totalBatches = Math.ceil(total / batchSize);
  const summary: IngestSummary = {
    total,
    saved: 0,
    errors: 0,
    skipped: 0,
    batches: 0,
    failedBatches: 0,
    cancelled: false,
    lastTimestamp: null,
  };

  logger.info({ experimentId, rows: total, batchSize, totalBatches }, 'measurement ingest started');

  for (let start = 0, batch = 1; start < total; start += batchSize, batch++) {
    if (options.signal?.aborted) {
      summary.cancelled = true;
      logger.warn({ experimentId, batch, totalBatches }, 'measurement ingest cancelled');
      break;
    }

    const records: NewMeasurement[] = [];
    const end = Math.min(start + batchSize, total);
    for (let i = start; i < end; i++) {
      const row = frame.rows[i];
      const stepNumber = stepNumbers[i];
      if (!row || stepNumber === undefined) continue;
      const stepId = stepMapping.get(stepNumber);
      if (stepId === undefined) {
        summary.skipped += 1;
        continue;
      }
      const measurement = buildMeasurement(row, stepId);
      if (measurement) records.push(measurement);
      else summary.errors += 1;
    }

    if (records.length) {
      try {
        summary.saved += await withStorageRetry(
          store,
          'measurements.insert',
          () => store.insertMeasurements(records),
          logger
        );
        for (const record of records) {
          // toISOString output orders lexicographically
          if (record.timestamp && (!summary.lastTimestamp || record.timestamp > summary.lastTimestamp)) {
            summary.lastTimestamp = record.timestamp;
          }
        }
      } catch (e) {
        summary.errors += records.length;
        summary.failedBatches += 1;
        logger.error(
          { experimentId, batch, rows: records.length, err: e instanceof Error ? e.message : String(e) },
          'measurement batch rolled back'
        );
      }
    }

    summary.batches += 1;
    options.onBatch?.({ batch, totalBatches, saved: summary.saved, errors: summary.errors, skipped: summary.skipped });
  }

  logger.info(
    { experimentId, saved: summary.saved, errors: summary.errors, skipped: summary.skipped, failedBatches: summary.failedBatches },
    'measurement ingest finished'
  );
  return summary;
}
