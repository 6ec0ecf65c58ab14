// src/config.ts
import { z } from 'zod';

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(8787),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_ANON_KEY: z.string().min(1).optional(),
    API_KEYS: z.string().default(''),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    BODY_LIMIT: z.string().default('50mb'),
    MEASUREMENT_BATCH_SIZE: z.coerce.number().int().min(1).max(50_000).default(1000),
    TIME_INTERVAL_MIN_SEC: z.coerce.number().min(0).default(0),
    TIME_INTERVAL_MAX_SEC: z.coerce.number().positive().default(3600),
  })
  .refine((env) => env.TIME_INTERVAL_MIN_SEC <= env.TIME_INTERVAL_MAX_SEC, {
    message: 'TIME_INTERVAL_MIN_SEC must not exceed TIME_INTERVAL_MAX_SEC',
    path: ['TIME_INTERVAL_MIN_SEC'],
  });

export interface IntervalBounds {
  min: number;
  max: number;
}

export interface AppConfig {
  port: number;
  supabaseUrl: string | null;
  supabaseKey: string | null;
  apiKeys: string[];
  logLevel: string;
  bodyLimit: string;
  batchSize: number;
  interval: IntervalBounds;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    supabaseUrl: parsed.SUPABASE_URL ?? null,
    supabaseKey: parsed.SUPABASE_ANON_KEY ?? null,
    apiKeys: parsed.API_KEYS.split(',').map((s) => s.trim()).filter(Boolean),
    logLevel: parsed.LOG_LEVEL,
    bodyLimit: parsed.BODY_LIMIT,
    batchSize: parsed.MEASUREMENT_BATCH_SIZE,
    interval: { min: parsed.TIME_INTERVAL_MIN_SEC, max: parsed.TIME_INTERVAL_MAX_SEC },
  };
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (cached) return cached;
  cached = loadConfig();
  return cached;
}
