// src/time_filter.ts
import type { IntervalBounds } from './config.js';
import { InvalidIntervalError } from './errors.js';
import { parseInteger, parseNumeric } from './frame.js';
import type { FrameRow, RowFrame } from './types.js';

export const DEFAULT_INTERVAL_BOUNDS: IntervalBounds = { min: 0, max: 3600 };

/** 0 stays 0 (no filtering); positive values are clamped into the bounds */
export function clampInterval(intervalSeconds: number, bounds: IntervalBounds = DEFAULT_INTERVAL_BOUNDS): number {
  if (!Number.isFinite(intervalSeconds) || intervalSeconds < 0) {
    throw new InvalidIntervalError(intervalSeconds);
  }
  if (intervalSeconds === 0) return 0;
  return Math.min(bounds.max, Math.max(bounds.min, intervalSeconds));
}

type Sample = { row: FrameRow; t: number };

function thinPartition(rows: FrameRow[], interval: number): FrameRow[] {
  const timed: Sample[] = [];
  const untimed: FrameRow[] = [];
  for (const row of rows) {
    const t = parseNumeric(row.execution_time);
    if (t === null) untimed.push(row);
    else timed.push({ row, t });
  }
  // stable, so equal timestamps keep file order
  timed.sort((a, b) => a.t - b.t);

  const kept: FrameRow[] = [];
  let lastKept = Number.NEGATIVE_INFINITY;
  timed.forEach((sample, i) => {
    const isBoundary = i === 0 || i === timed.length - 1;
    if (isBoundary || sample.t >= lastKept + interval) {
      kept.push(sample.row);
      lastKept = sample.t;
    }
  });

  return [...kept, ...untimed];
}

/**
 * Downsamples each step_number partition so kept samples are at least
 * `intervalSeconds` apart. The first and last sample of every partition
 * survive regardless of spacing. 0 returns the frame untouched.
 */
export function filterByTimeInterval(
  frame: RowFrame,
  intervalSeconds: number,
  bounds: IntervalBounds = DEFAULT_INTERVAL_BOUNDS
): RowFrame {
  const interval = clampInterval(intervalSeconds, bounds);
  if (interval === 0) return frame;

  const partitions = new Map<string, FrameRow[]>();
  for (const row of frame.rows) {
    // same key the measurement join uses: "1", "1.0" and "01" are one step
    const step = parseInteger(row.step_number);
    const key = step !== null ? String(step) : `raw:${row.step_number?.trim() ?? ''}`;
    const bucket = partitions.get(key);
    if (bucket) bucket.push(row);
    else partitions.set(key, [row]);
  }

  const rows: FrameRow[] = [];
  for (const bucket of partitions.values()) {
    rows.push(...thinPartition(bucket, interval));
  }
  return { columns: frame.columns, rows };
}

/** --- density presets --- */

export interface IntervalPreset {
  key: string;
  name: string;
  interval: number;
  description: string;
}

export const TIME_INTERVAL_PRESETS: readonly IntervalPreset[] = [
  { key: 'ultra_high_density', name: 'Ultra high density', interval: 0.1, description: 'more than 10 samples per second' },
  { key: 'high_density', name: 'High density', interval: 1, description: '1-10 samples per second, standard cycling' },
  { key: 'medium_density', name: 'Medium density', interval: 10, description: 'one sample per 10 s, stability tests' },
  { key: 'low_density', name: 'Low density', interval: 60, description: 'one sample per minute, ageing and fade tracking' },
  { key: 'very_low_density', name: 'Very low density', interval: 300, description: 'one sample per 5 min, long-term monitoring' },
];

export const TEST_DATA_TYPES = [
  'charge_discharge_cycle',
  'capacity_test',
  'impedance_test',
  'aging_test',
  'temperature_test',
] as const;

export type TestDataType = (typeof TEST_DATA_TYPES)[number];

const DATA_TYPE_LIMITS: Record<TestDataType, { recommended: number; max: number; reason: string }> = {
  charge_discharge_cycle: { recommended: 1, max: 10, reason: 'cycling needs the voltage and current transitions' },
  capacity_test: { recommended: 5, max: 30, reason: 'capacity tests follow the capacity trend' },
  impedance_test: { recommended: 0.1, max: 1, reason: 'impedance tests need high-frequency response' },
  aging_test: { recommended: 60, max: 300, reason: 'ageing tests follow long-term drift' },
  temperature_test: { recommended: 10, max: 60, reason: 'temperature tests track thermal response' },
};

export type SizeCategory = 'small' | 'medium' | 'large' | 'very_large';

const SIZE_RULES: Array<{ category: SizeCategory; upTo: number; interval: number; message: string }> = [
  { category: 'small', upTo: 1_000, interval: 0, message: 'small dataset, keep every sample' },
  { category: 'medium', upTo: 10_000, interval: 1, message: 'medium dataset, 1 s spacing suggested' },
  { category: 'large', upTo: 100_000, interval: 10, message: 'large dataset, 10 s spacing suggested' },
  { category: 'very_large', upTo: Number.POSITIVE_INFINITY, interval: 60, message: 'very large dataset, 1 min spacing suggested' },
];

export interface IntervalRecommendation {
  interval: number;
  message: string;
  sizeCategory: SizeCategory;
  dataSize: number;
}

export function isTestDataType(value: string): value is TestDataType {
  return Object.prototype.hasOwnProperty.call(DATA_TYPE_LIMITS, value);
}

export function recommendInterval(dataSize: number, dataType?: TestDataType): IntervalRecommendation {
  const rule = SIZE_RULES.find((r) => dataSize <= r.upTo) ?? SIZE_RULES[SIZE_RULES.length - 1];
  if (!rule) throw new Error('no size rule configured');

  let interval = rule.interval;
  let message = rule.message;
  if (dataType) {
    const limits = DATA_TYPE_LIMITS[dataType];
    if (rule.interval > limits.max) {
      interval = limits.max;
      message = `adjusted for ${dataType}: ${limits.reason}`;
    } else {
      interval = Math.max(rule.interval, limits.recommended);
    }
  }

  return { interval, message, sizeCategory: rule.category, dataSize };
}
