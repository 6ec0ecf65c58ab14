// src/columns.ts
import type { RowFrame } from './types.js';

export type CanonicalField =
  | 'step_number'
  | 'step_type'
  | 'step_name'
  | 'status'
  | 'execution_time'
  | 'timestamp'
  | 'start_time'
  | 'end_time'
  | 'duration'
  | 'voltage'
  | 'voltage_start'
  | 'voltage_end'
  | 'current'
  | 'temperature'
  | 'capacity'
  | 'energy'
  | 'soc';

export interface ColumnAlias {
  alias: string;
  canonical: CanonicalField;
}

/** Cycler export headers (English) */
export const PRIMARY_VOCABULARY: readonly ColumnAlias[] = [
  { alias: 'Step_Index', canonical: 'step_number' },
  { alias: 'Step Index', canonical: 'step_number' },
  { alias: 'Step_Type', canonical: 'step_type' },
  { alias: 'Step Type', canonical: 'step_type' },
  { alias: 'Step_Name', canonical: 'step_name' },
  { alias: 'Status', canonical: 'status' },
  { alias: 'Step_Time', canonical: 'execution_time' },
  { alias: 'Step Time [s]', canonical: 'execution_time' },
  { alias: 'Date_Time', canonical: 'timestamp' },
  { alias: 'DateTime', canonical: 'timestamp' },
  { alias: 'DateTime [s]', canonical: 'timestamp' },
  { alias: 'Start_Time', canonical: 'start_time' },
  { alias: 'Start DateTime [s]', canonical: 'start_time' },
  { alias: 'End_Time', canonical: 'end_time' },
  { alias: 'End DateTime [s]', canonical: 'end_time' },
  { alias: 'Duration', canonical: 'duration' },
  { alias: 'Voltage', canonical: 'voltage' },
  { alias: 'Voltage [V]', canonical: 'voltage' },
  { alias: 'Start_Voltage', canonical: 'voltage_start' },
  { alias: 'Start Voltage [V]', canonical: 'voltage_start' },
  { alias: 'End_Voltage', canonical: 'voltage_end' },
  { alias: 'End Voltage [V]', canonical: 'voltage_end' },
  { alias: 'Current', canonical: 'current' },
  { alias: 'Current [A]', canonical: 'current' },
  { alias: 'Temperature', canonical: 'temperature' },
  { alias: 'Aux T1 [oC]', canonical: 'temperature' },
  { alias: 'Capacity', canonical: 'capacity' },
  { alias: 'Capacity [Ah]', canonical: 'capacity' },
  { alias: 'Energy', canonical: 'energy' },
  { alias: 'Energy [Wh]', canonical: 'energy' },
  { alias: 'SOC', canonical: 'soc' },
];

/** Bilingual export headers */
export const SECONDARY_VOCABULARY: readonly ColumnAlias[] = [
  { alias: '工步', canonical: 'step_number' },
  { alias: '工步種類', canonical: 'step_type' },
  { alias: '工步執行時間(秒)', canonical: 'execution_time' },
  { alias: '電壓(V)', canonical: 'voltage' },
  { alias: '電流(A)', canonical: 'current' },
  { alias: 'Aux T1', canonical: 'temperature' },
  { alias: '電量(Ah)', canonical: 'capacity' },
  { alias: '能量(Wh)', canonical: 'energy' },
];

export const COLUMN_ALIASES: readonly ColumnAlias[] = [...PRIMARY_VOCABULARY, ...SECONDARY_VOCABULARY];

/**
 * Adds canonical columns copied from the first alias present in the frame.
 * A canonical column that already exists is never overwritten; source
 * columns, mapped or not, are kept as they are.
 */
export function normalizeColumns(frame: RowFrame, aliases: readonly ColumnAlias[] = COLUMN_ALIASES): RowFrame {
  const present = new Set(frame.columns);
  const added: Array<[CanonicalField, string]> = [];

  for (const { alias, canonical } of aliases) {
    if (present.has(canonical) || !present.has(alias)) continue;
    added.push([canonical, alias]);
    present.add(canonical);
  }

  if (!added.length) return frame;

  return {
    columns: [...frame.columns, ...added.map(([canonical]) => canonical)],
    rows: frame.rows.map((row) => {
      const next = { ...row };
      for (const [canonical, alias] of added) next[canonical] = row[alias] ?? null;
      return next;
    }),
  };
}
