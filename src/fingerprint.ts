// src/fingerprint.ts
import { createHash } from 'node:crypto';
import { getLogger, type Logger } from './logger.js';
import { withStorageRetry, type IngestionStore } from './store.js';

/** MD5 over the raw upload bytes; a single changed byte gives a new hash */
export function fingerprint(content: Uint8Array): string {
  return createHash('md5').update(content).digest('hex');
}

/**
 * True when a processed_files row carries this hash. A store that keeps
 * failing after the retry counts as "not processed": ingestion stays
 * available at the price of a possible duplicate.
 */
export async function isAlreadyProcessed(
  store: IngestionStore,
  hash: string,
  logger: Logger = getLogger()
): Promise<boolean> {
  if (!hash) return false;
  try {
    const existing = await withStorageRetry(store, 'processed_files.lookup', () => store.findProcessedFileByHash(hash), logger);
    return existing !== null;
  } catch (e) {
    logger.warn(
      { hash, err: e instanceof Error ? e.message : String(e) },
      'dedup lookup failed twice, treating file as unprocessed'
    );
    return false;
  }
}
