// src/supabase.ts
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getConfig } from './config.js';

let client: SupabaseClient | null = null;

export function getClient(): SupabaseClient {
  if (client) return client;

  const { supabaseUrl: url, supabaseKey: key } = getConfig();

  if (!url) throw new Error('SUPABASE_URL env var is required');
  if (!key) throw new Error('SUPABASE_ANON_KEY env var is required');

  client = createClient(url, key, {
    auth: { persistSession: false },
    global: { headers: { 'X-Client-Info': 'cell-test-ingest/1.0' } },
  });

  return client;
}

/** Next getClient() builds a fresh client */
export function resetClient(): void {
  client = null;
}
