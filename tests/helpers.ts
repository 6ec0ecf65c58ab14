import { normalizeColumns } from '../src/columns.js';
import { parseDelimited } from '../src/frame.js';
import type { UploadedFile } from '../src/ingest.js';
import { createLogger } from '../src/logger.js';
import type { IngestionStore } from '../src/store.js';
import type {
  Cell,
  Experiment,
  NewExperiment,
  NewMeasurement,
  NewProcessedFile,
  NewStep,
  ProcessedFile,
  RowFrame,
  Step,
} from '../src/types.js';

export const silentLogger = createLogger('silent');

export function frameOf(csv: string): RowFrame {
  return normalizeColumns(parseDelimited(csv));
}

export function fileOf(filename: string, text: string): UploadedFile {
  return { filename, content: Buffer.from(text, 'utf8') };
}

/** local wall-clock time as ISO, the way cycler timestamps are read */
export function localIso(y: number, mo: number, d: number, h: number, mi: number, s: number): string {
  return new Date(y, mo - 1, d, h, mi, s).toISOString();
}

type StoreMethod = Exclude<keyof IngestionStore, 'reconnect'>;

/** In-process IngestionStore with injectable failures */
export class MemoryStore implements IngestionStore {
  cells = new Map<number, Cell>();
  experiments: Array<NewExperiment & { id: number }> = [];
  steps: Step[] = [];
  measurements: NewMeasurement[] = [];
  processedFiles: ProcessedFile[] = [];
  reconnects = 0;
  calls: Partial<Record<StoreMethod, number>> = {};
  /** batches for which this returns true are rejected on every attempt */
  rejectMeasurements: ((rows: NewMeasurement[]) => boolean) | null = null;

  private failures = new Map<StoreMethod, number>();
  private nextId = 1;

  /** the next `times` calls of `method` reject */
  failTimes(method: StoreMethod, times: number): this {
    this.failures.set(method, times);
    return this;
  }

  reconnect(): void {
    this.reconnects += 1;
  }

  private enter(method: StoreMethod): void {
    this.calls[method] = (this.calls[method] ?? 0) + 1;
    const left = this.failures.get(method) ?? 0;
    if (left > 0) {
      this.failures.set(method, left - 1);
      throw new Error(`${method} unavailable`);
    }
  }

  async findProcessedFileByHash(hash: string): Promise<ProcessedFile | null> {
    this.enter('findProcessedFileByHash');
    return this.processedFiles.find((f) => f.file_hash === hash) ?? null;
  }

  async getCell(id: number): Promise<Cell | null> {
    this.enter('getCell');
    return this.cells.get(id) ?? null;
  }

  async createExperiment(experiment: NewExperiment): Promise<Experiment> {
    this.enter('createExperiment');
    const stored = { ...experiment, id: this.nextId++ };
    this.experiments.push(stored);
    const { validation_report: _report, ...rest } = stored;
    return rest;
  }

  async insertSteps(steps: NewStep[]): Promise<Step[]> {
    this.enter('insertSteps');
    const stored = steps.map((s) => ({ ...s, id: this.nextId++ }));
    this.steps.push(...stored);
    return stored;
  }

  async insertMeasurements(rows: NewMeasurement[]): Promise<number> {
    this.enter('insertMeasurements');
    if (this.rejectMeasurements?.(rows)) throw new Error('measurements rejected');
    this.measurements.push(...rows);
    return rows.length;
  }

  async updateExperimentEndDate(experimentId: number, endDate: string): Promise<void> {
    this.enter('updateExperimentEndDate');
    const experiment = this.experiments.find((e) => e.id === experimentId);
    if (!experiment) throw new Error(`experiment ${experimentId} not found`);
    experiment.end_date = endDate;
  }

  async insertProcessedFiles(files: NewProcessedFile[]): Promise<ProcessedFile[]> {
    this.enter('insertProcessedFiles');
    const stored = files.map((f) => ({ ...f, id: this.nextId++, processed_at: new Date().toISOString() }));
    this.processedFiles.push(...stored);
    return stored;
  }
}

/** --- fixtures --- */

export const STEP_CSV = [
  'Step_Index,Step_Type,Step_Name,Status,Start_Time,End_Time,Current,Capacity',
  '1,CC_Chg,Charge,Finished,2024-01-01T10:00:00,2024-01-01T10:00:20,1.5,0.01',
  '2,Rest,Rest,Finished,2024-01-01T10:00:20,2024-01-01T10:00:30,0,0',
  '3,CC_DChg,Discharge,Finished,2024-01-01T10:00:30,2024-01-01T10:00:50,-1.5,0.01',
].join('\n');

export const DETAIL_CSV = [
  'Date_Time,Step_Index,Step_Time,Voltage,Current,Temperature,Capacity,Energy',
  '2024-01-01T10:00:00,1,0,3.6,1.5,25.0,0,0',
  '2024-01-01T10:00:10,1,10,3.8,1.5,26.0,0.004,0.015',
  '2024-01-01T10:00:20,1,20,4.0,1.5,27.0,0.008,0.031',
  '2024-01-01T10:00:20,2,0,4.0,0,27.0,0,0',
  '2024-01-01T10:00:30,2,10,3.95,0,26.0,0,0',
  '2024-01-01T10:00:30,3,0,3.9,-1.5,26.0,0,0',
  '2024-01-01T10:00:50,3,20,3.5,-1.5,28.0,0.008,0.03',
].join('\n');
