// src/transform.ts
import { parseInteger, parseNumeric } from './frame.js';
import type { RowFrame, StepType } from './types.js';

const STEP_TYPE_LABELS: Record<string, StepType> = {
  cc_chg: 'charge',
  cccv_chg: 'charge',
  cv_chg: 'charge',
  chg: 'charge',
  charge: 'charge',
  cc_dchg: 'discharge',
  cccv_dchg: 'discharge',
  cp_dchg: 'discharge',
  dchg: 'discharge',
  discharge: 'discharge',
  rest: 'rest',
  pause: 'rest',
  'cc充電': 'charge',
  'cccv充電': 'charge',
  '充電': 'charge',
  'cc放電': 'discharge',
  '放電': 'discharge',
  '靜置': 'rest',
};

/** Cycler step labels to charge/discharge/rest; anything else is 'unknown' */
export function normalizeStepType(raw: string): StepType {
  return STEP_TYPE_LABELS[raw.trim().toLowerCase()] ?? 'unknown';
}

export interface TemperatureMetrics {
  avg: number;
  min: number;
  max: number;
}

/** Per-step temperature statistics from the detail log, keyed by step_number */
export function temperatureMetricsByStep(detail: RowFrame): Map<number, TemperatureMetrics> {
  const acc = new Map<number, { sum: number; count: number; min: number; max: number }>();
  for (const row of detail.rows) {
    const step = parseInteger(row.step_number);
    const t = parseNumeric(row.temperature);
    if (step === null || t === null) continue;
    const cur = acc.get(step);
    if (cur) {
      cur.sum += t;
      cur.count += 1;
      cur.min = Math.min(cur.min, t);
      cur.max = Math.max(cur.max, t);
    } else {
      acc.set(step, { sum: t, count: 1, min: t, max: t });
    }
  }

  const out = new Map<number, TemperatureMetrics>();
  for (const [step, a] of acc) out.set(step, { avg: a.sum / a.count, min: a.min, max: a.max });
  return out;
}

/** Mean of the detail temperature column; null without numeric samples */
export function meanTemperature(detail: RowFrame): number | null {
  let sum = 0;
  let count = 0;
  for (const row of detail.rows) {
    const t = parseNumeric(row.temperature);
    if (t === null) continue;
    sum += t;
    count += 1;
  }
  return count ? sum / count : null;
}
