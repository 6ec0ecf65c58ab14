// src/types.ts

export type FileType = 'step' | 'detail';

export type StepType = 'charge' | 'discharge' | 'rest' | 'unknown';

/** Parsed delimited file: header row + string cells (null = empty cell) */
export interface RowFrame {
  columns: string[];
  rows: FrameRow[];
}

export type FrameRow = Record<string, string | null>;

export interface Cell {
  id: number;
  chemistry: string | null;
}

export interface NewExperiment {
  name: string;
  description: string | null;
  operator: string | null;
  battery_type: string;
  nominal_capacity: number;
  temperature_avg: number | null;
  start_date: string;       // ISO8601
  end_date: string | null;
  validation_status: boolean;
  validation_report: unknown;
  cell_id: number;
  machine_id: number;
}

/** Stored experiment as read back; the report blob is not fetched again */
export interface Experiment extends Omit<NewExperiment, 'validation_report'> {
  id: number;
}

export interface NewStep {
  experiment_id: number;
  step_number: number;
  step_type: StepType;
  original_step_type: string;
  start_time: string | null;
  end_time: string | null;
  duration: number | null;  // s
  voltage_start: number | null;
  voltage_end: number | null;
  current: number | null;
  capacity: number | null;
  energy: number | null;
  temperature_avg: number | null;
  temperature_min: number | null;
  temperature_max: number | null;
  c_rate: number;
  data_meta: FrameRow;
}

export interface Step extends NewStep {
  id: number;
}

export interface NewMeasurement {
  step_id: number;
  execution_time: number;   // s since step start
  timestamp: string | null;
  voltage: number;
  current: number;
  temperature: number;
  capacity: number;
  energy: number;
  soc: number | null;
}

export interface NewProcessedFile {
  experiment_id: number;
  filename: string;
  file_type: FileType;
  file_hash: string;
  row_count: number;
  data_meta: Record<string, unknown>;
}

export interface ProcessedFile extends NewProcessedFile {
  id: number;
  processed_at: string;
}

/** step_number -> step id, built once per run after steps commit */
export type StepMapping = Map<number, number>;
