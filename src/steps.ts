// src/steps.ts
import { differenceInMilliseconds } from 'date-fns';
import { StructuralError } from './errors.js';
import { isBlank, parseInteger, parseNumeric } from './frame.js';
import { getLogger, type Logger } from './logger.js';
import { withStorageRetry, type IngestionStore } from './store.js';
import { parseTimestamp } from './time.js';
import { normalizeStepType, type TemperatureMetrics } from './transform.js';
import type { FrameRow, NewStep, Step, StepMapping } from './types.js';

/** |current| / nominal capacity; 0 when the capacity is missing or not positive */
export function calculateCRate(current: number | null, nominalCapacity: number | null | undefined): number {
  if (current === null || !nominalCapacity || !(nominalCapacity > 0)) return 0;
  return Math.abs(current) / nominalCapacity;
}

/** null when the row has no usable step_number or step_type */
export function buildStepRecord(
  experimentId: number,
  row: FrameRow,
  nominalCapacity: number,
  temperatures?: Map<number, TemperatureMetrics>
): NewStep | null {
  const stepNumber = parseInteger(row.step_number);
  const rawType = row.step_type;
  if (stepNumber === null || rawType === null || rawType === undefined || isBlank(rawType)) return null;

  const start = parseTimestamp(row.start_time);
  const end = parseTimestamp(row.end_time);
  const duration = parseNumeric(row.duration) ?? (start && end ? differenceInMilliseconds(end, start) / 1000 : null);

  const current = parseNumeric(row.current);
  const rowTemperature = parseNumeric(row.temperature);
  const measured = temperatures?.get(stepNumber);

  return {
    experiment_id: experimentId,
    step_number: stepNumber,
    step_type: normalizeStepType(rawType),
    original_step_type: rawType.trim(),
    start_time: start ? start.toISOString() : null,
    end_time: end ? end.toISOString() : null,
    duration,
    voltage_start: parseNumeric(row.voltage_start),
    voltage_end: parseNumeric(row.voltage_end),
    current,
    capacity: parseNumeric(row.capacity),
    energy: parseNumeric(row.energy),
    temperature_avg: measured?.avg ?? rowTemperature,
    temperature_min: measured?.min ?? rowTemperature,
    temperature_max: measured?.max ?? rowTemperature,
    c_rate: calculateCRate(current, nominalCapacity),
    data_meta: row,
  };
}

export interface RegisterStepsOptions {
  temperatures?: Map<number, TemperatureMetrics>;
  logger?: Logger;
}

/**
 * Inserts the parseable step rows of one experiment and returns them with
 * their ids. The insert has committed when this resolves. Rows without a
 * step_number or step_type are skipped, as are repeats of a step_number.
 */
export async function registerSteps(
  store: IngestionStore,
  experimentId: number,
  rows: FrameRow[],
  nominalCapacity: number,
  options: RegisterStepsOptions = {}
): Promise<Step[]> {
  const logger = options.logger ?? getLogger();
  const records: NewStep[] = [];
  const seen = new Set<number>();

  rows.forEach((row, index) => {
    const record = buildStepRecord(experimentId, row, nominalCapacity, options.temperatures);
    if (!record) {
      logger.warn({ experimentId, row: index + 1 }, 'step row without step_number/step_type skipped');
      return;
    }
    if (seen.has(record.step_number)) {
      logger.warn({ experimentId, step: record.step_number }, 'repeated step_number skipped');
      return;
    }
    seen.add(record.step_number);
    records.push(record);
  });

  if (!records.length) return [];

  const steps = await withStorageRetry(store, 'steps.insert', () => store.insertSteps(records), logger);
  logger.info({ experimentId, steps: steps.length, skipped: rows.length - records.length }, 'steps committed');
  return steps;
}

export function buildStepMapping(steps: Array<{ id: number | null; step_number: number }>): StepMapping {
  const mapping: StepMapping = new Map();
  for (const step of steps) {
    if (step.id === null) continue;
    mapping.set(step.step_number, step.id);
  }
  return mapping;
}

/** Every selected step must have an id before any measurement is written */
export function assertMappingComplete(mapping: StepMapping, selected: Iterable<number>): void {
  const missing = [...new Set(selected)].filter((n) => !mapping.has(n)).sort((a, b) => a - b);
  if (missing.length) {
    throw new StructuralError(
      `step mapping incomplete: no step id for step number(s) ${missing.join(', ')}`,
      missing.map(String)
    );
  }
}
