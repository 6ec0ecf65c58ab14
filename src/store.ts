// src/store.ts
import { StorageError } from './errors.js';
import type { Logger } from './logger.js';
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

/**
 * Persistence collaborator. Every write is one committed request: a call
 * that resolves has committed, a call that rejects has written nothing.
 */
export interface IngestionStore {
  /** Drops the current connection; the next call opens a fresh one */
  reconnect(): void;
  findProcessedFileByHash(hash: string): Promise<ProcessedFile | null>;
  getCell(id: number): Promise<Cell | null>;
  createExperiment(experiment: NewExperiment): Promise<Experiment>;
  insertSteps(steps: NewStep[]): Promise<Step[]>;
  /** Returns the number of rows written */
  insertMeasurements(rows: NewMeasurement[]): Promise<number>;
  updateExperimentEndDate(experimentId: number, endDate: string): Promise<void>;
  insertProcessedFiles(files: NewProcessedFile[]): Promise<ProcessedFile[]>;
}

/** Runs `op`; on failure reconnects and runs it once more. The second failure surfaces as a StorageError. */
export async function withStorageRetry<T>(
  store: IngestionStore,
  label: string,
  op: () => Promise<T>,
  logger?: Logger
): Promise<T> {
  try {
    return await op();
  } catch (e) {
    logger?.warn({ op: label, err: e instanceof Error ? e.message : String(e) }, 'storage call failed, retrying once');
    store.reconnect();
  }
  try {
    return await op();
  } catch (e) {
    if (e instanceof StorageError) throw e;
    throw new StorageError(label, e instanceof Error ? e.message : String(e), { cause: e });
  }
}
