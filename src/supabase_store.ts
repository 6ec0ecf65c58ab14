// src/supabase_store.ts
import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { StorageError } from './errors.js';
import type { IngestionStore } from './store.js';
import { getClient, resetClient } from './supabase.js';
import type {
  Cell,
  Experiment,
  NewExperiment,
  NewMeasurement,
  NewProcessedFile,
  NewStep,
  ProcessedFile,
  Step,
} from './types.js';

/** --- row shapes coming back from PostgREST --- */
const num = z.coerce.number();
const nullableNum = z.number().nullable();
const cellValue = z.string().nullable();

const CellRow = z.object({ id: num, chemistry: z.string().nullable() });

const ExperimentRow = z.object({
  id: num,
  name: z.string(),
  description: z.string().nullable(),
  operator: z.string().nullable(),
  battery_type: z.string(),
  nominal_capacity: num,
  temperature_avg: nullableNum,
  start_date: z.string(),
  end_date: z.string().nullable(),
  validation_status: z.boolean(),
  cell_id: num,
  machine_id: num,
});

const StepRow = z.object({
  id: num,
  experiment_id: num,
  step_number: num,
  step_type: z.enum(['charge', 'discharge', 'rest', 'unknown']),
  original_step_type: z.string(),
  start_time: z.string().nullable(),
  end_time: z.string().nullable(),
  duration: nullableNum,
  voltage_start: nullableNum,
  voltage_end: nullableNum,
  current: nullableNum,
  capacity: nullableNum,
  energy: nullableNum,
  temperature_avg: nullableNum,
  temperature_min: nullableNum,
  temperature_max: nullableNum,
  c_rate: num,
  data_meta: z.record(cellValue),
});

const ProcessedFileRow = z.object({
  id: num,
  experiment_id: num,
  filename: z.string(),
  file_type: z.enum(['step', 'detail']),
  file_hash: z.string(),
  row_count: num,
  processed_at: z.string(),
  data_meta: z.record(z.unknown()),
});

type Fail = { message: string } | null;

function check(operation: string, error: Fail): void {
  if (error) throw new StorageError(operation, error.message);
}

/** IngestionStore over the Supabase tables; each call is one PostgREST request (one transaction) */
export class SupabaseIngestionStore implements IngestionStore {
  constructor(private readonly clientFactory: () => SupabaseClient = getClient) {}

  private get db(): SupabaseClient {
    return this.clientFactory();
  }

  reconnect(): void {
    resetClient();
  }

  async findProcessedFileByHash(hash: string): Promise<ProcessedFile | null> {
    const { data, error } = await this.db.from('processed_files').select('*').eq('file_hash', hash).maybeSingle();
    check('processed_files.select', error);
    return data ? ProcessedFileRow.parse(data) : null;
  }

  async getCell(id: number): Promise<Cell | null> {
    const { data, error } = await this.db.from('cells').select('id, chemistry').eq('id', id).maybeSingle();
    check('cells.select', error);
    return data ? CellRow.parse(data) : null;
  }

  async createExperiment(experiment: NewExperiment): Promise<Experiment> {
    const { data, error } = await this.db.from('experiments').insert(experiment).select().single();
    check('experiments.insert', error);
    return ExperimentRow.parse(data);
  }

  async insertSteps(steps: NewStep[]): Promise<Step[]> {
    const { data, error } = await this.db.from('steps').insert(steps).select();
    check('steps.insert', error);
    return z.array(StepRow).parse(data ?? []);
  }

  async insertMeasurements(rows: NewMeasurement[]): Promise<number> {
    const { error, count } = await this.db.from('measurements').insert(rows, { count: 'exact' });
    check('measurements.insert', error);
    return count ?? rows.length;
  }

  async updateExperimentEndDate(experimentId: number, endDate: string): Promise<void> {
    const { data, error } = await this.db
      .from('experiments')
      .update({ end_date: endDate })
      .eq('id', experimentId)
      .select('id');
    check('experiments.update', error);
    if (!data?.length) throw new StorageError('experiments.update', `experiment ${experimentId} not found`);
  }

  async insertProcessedFiles(files: NewProcessedFile[]): Promise<ProcessedFile[]> {
    const { data, error } = await this.db.from('processed_files').insert(files).select();
    check('processed_files.insert', error);
    return z.array(ProcessedFileRow).parse(data ?? []);
  }
}
