// src/errors.ts
import { ZodError } from 'zod';

/** Fatal input problem: raised before any measurement is written */
export class StructuralError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = 'StructuralError';
    this.missing = missing;
  }
}

export class InvalidIntervalError extends StructuralError {
  constructor(readonly interval: number) {
    super(`time interval must be a non-negative number of seconds, got ${interval}`);
    this.name = 'InvalidIntervalError';
  }
}

/** Backend failure that survived the retry */
export class StorageError extends Error {
  constructor(readonly operation: string, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options);
    this.name = 'StorageError';
  }
}

export class LockHeldError extends Error {
  constructor(readonly lockPath: string, readonly holder: string) {
    super(`database is being written by another process (${holder || 'unknown holder'}), try again later`);
    this.name = 'LockHeldError';
  }
}

export interface ErrorBody {
  error: { code: string; message: string; details?: unknown };
}

export function mapErrorToResponse(e: unknown): { status: number; body: ErrorBody } {
  if (e instanceof ZodError) {
    return {
      status: 422,
      body: { error: { code: 'VALIDATION_ERROR', message: 'Invalid payload', details: e.issues } },
    };
  }
  if (e instanceof StructuralError) {
    return {
      status: 422,
      body: { error: { code: 'STRUCTURAL_ERROR', message: e.message, details: e.missing.length ? e.missing : undefined } },
    };
  }
  if (e instanceof StorageError) {
    return { status: 503, body: { error: { code: 'STORAGE_ERROR', message: e.message } } };
  }
  const message = e instanceof Error ? e.message : 'internal error';
  return { status: 500, body: { error: { code: 'INTERNAL', message } } };
}
