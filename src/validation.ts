// src/validation.ts
import type { CanonicalField } from './columns.js';
import { columnValues, hasColumn, isBlank, parseNumeric } from './frame.js';
import { parseTimestamp } from './time.js';
import type { RowFrame } from './types.js';

interface Requirement {
  header: string;
  canonical: CanonicalField;
}

/** English header names; the canonical column derived from either vocabulary satisfies them too */
export const STEP_REQUIRED_COLUMNS: readonly Requirement[] = [
  { header: 'Step_Index', canonical: 'step_number' },
  { header: 'Step_Type', canonical: 'step_type' },
  { header: 'Step_Name', canonical: 'step_name' },
  { header: 'Status', canonical: 'status' },
];

export const DETAIL_REQUIRED_COLUMNS: readonly Requirement[] = [
  { header: 'Date_Time', canonical: 'timestamp' },
  { header: 'Voltage', canonical: 'voltage' },
  { header: 'Current', canonical: 'current' },
];

export type StatColumn = 'Voltage' | 'Current' | 'Capacity';

export type ColumnStats =
  | { valid: true; min: number; max: number; mean: number }
  | { valid: false };

export interface FileReport {
  row_count: number;
  column_count: number;
  columns: string[];
  missing_columns: string[];
  has_required_columns: boolean;
  time_range_valid: boolean;
  start_time?: string;
  end_time?: string;
}

export interface StepReport extends FileReport {
  step_types: Record<string, number>;
}

export interface DetailReport extends FileReport {
  stats: Record<StatColumn, ColumnStats>;
}

export interface ValidationResult {
  valid: boolean;
  step: StepReport;
  detail: DetailReport;
}

function structure(frame: RowFrame, required: readonly Requirement[]) {
  const missing = required
    .filter((r) => !hasColumn(frame, r.header) && !hasColumn(frame, r.canonical))
    .map((r) => r.header);
  return {
    row_count: frame.rows.length,
    column_count: frame.columns.length,
    columns: [...frame.columns],
    missing_columns: missing,
    has_required_columns: missing.length === 0,
  };
}

function timeRange(frame: RowFrame): Pick<FileReport, 'time_range_valid' | 'start_time' | 'end_time'> {
  const columns = (['timestamp', 'start_time', 'end_time'] as const).filter((c) => hasColumn(frame, c));
  if (!columns.length) return { time_range_valid: false };

  let min: Date | null = null;
  let max: Date | null = null;
  for (const column of columns) {
    for (const value of columnValues(frame, column)) {
      if (isBlank(value)) continue;
      const d = parseTimestamp(value);
      if (!d) return { time_range_valid: false };
      if (!min || d < min) min = d;
      if (!max || d > max) max = d;
    }
  }
  if (!min || !max) return { time_range_valid: false };
  return { time_range_valid: true, start_time: min.toISOString(), end_time: max.toISOString() };
}

export function columnStats(frame: RowFrame, column: string): ColumnStats {
  if (!hasColumn(frame, column)) return { valid: false };

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  let sum = 0;
  let count = 0;
  for (const value of columnValues(frame, column)) {
    if (isBlank(value)) continue;
    const n = parseNumeric(value);
    if (n === null) return { valid: false };
    min = Math.min(min, n);
    max = Math.max(max, n);
    sum += n;
    count += 1;
  }
  if (!count) return { valid: false };
  return { valid: true, min, max, mean: sum / count };
}

/** Frequency of each step type label; blank cells are not counted */
export function stepTypeCounts(frame: RowFrame): Record<string, number> {
  const column = hasColumn(frame, 'step_type') ? 'step_type' : 'Step_Type';
  const counts: Record<string, number> = {};
  if (!hasColumn(frame, column)) return counts;
  for (const value of columnValues(frame, column)) {
    if (value === null || isBlank(value)) continue;
    const key = value.trim();
    counts[key] = (counts[key] ?? 0) + 1;
  }
  return counts;
}

export function validateStepFrame(frame: RowFrame): StepReport {
  return {
    ...structure(frame, STEP_REQUIRED_COLUMNS),
    step_types: stepTypeCounts(frame),
    ...timeRange(frame),
  };
}

export function validateDetailFrame(frame: RowFrame): DetailReport {
  const statFor = (canonical: string, label: StatColumn) =>
    columnStats(frame, hasColumn(frame, canonical) ? canonical : label);
  const stats: Record<StatColumn, ColumnStats> = {
    Voltage: statFor('voltage', 'Voltage'),
    Current: statFor('current', 'Current'),
    Capacity: statFor('capacity', 'Capacity'),
  };
  return {
    ...structure(frame, DETAIL_REQUIRED_COLUMNS),
    stats,
    ...timeRange(frame),
  };
}

/**
 * Advisory report over both files. `valid` gates ingestion only when the
 * caller honours it.
 */
export function validateFrames(stepFrame: RowFrame, detailFrame: RowFrame): ValidationResult {
  const step = validateStepFrame(stepFrame);
  const detail = validateDetailFrame(detailFrame);
  const valid =
    step.has_required_columns && detail.has_required_columns && step.row_count > 0 && detail.row_count > 0;
  return { valid, step, detail };
}
