// src/index.ts
import 'dotenv/config';
import { createApp } from './app.js';
import { getConfig } from './config.js';
import { createLogger } from './logger.js';
import { SupabaseIngestionStore } from './supabase_store.js';

const config = getConfig();
const logger = createLogger(config.logLevel);

if (!config.apiKeys.length) logger.warn('API_KEYS is empty, every authenticated route will answer 401');

const app = createApp({ store: new SupabaseIngestionStore(), config, logger });

app.listen(config.port, () => {
  logger.info({ port: config.port }, 'ingestion API listening');
});
