// src/logger.ts
import { pino, stdTimeFunctions, type Logger } from 'pino';

export type { Logger };

export function createLogger(level: string): Logger {
  return pino({
    level,
    base: undefined,
    timestamp: stdTimeFunctions.isoTime,
  });
}

let root: Logger | null = null;

export function getLogger(): Logger {
  if (root) return root;
  root = createLogger(process.env.LOG_LEVEL || 'info');
  return root;
}
