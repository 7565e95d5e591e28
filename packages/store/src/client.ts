/**
 * Supabase client initialization and configuration.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { WebSocket } from 'ws';

export interface SupabaseConfig {
  url: string;
  anonKey: string;
  serviceRoleKey?: string | undefined;
}

/**
 * Get Supabase configuration from environment variables or explicit config.
 * Priority: explicit config > environment variables
 */
export function getSupabaseConfig(
  config?: Partial<SupabaseConfig>,
  env: NodeJS.ProcessEnv = process.env
): SupabaseConfig {
  const url = config?.url ?? env['SUPABASE_URL'];
  const anonKey = config?.anonKey ?? env['SUPABASE_ANON_KEY'];
  const serviceRoleKey = config?.serviceRoleKey ?? env['SUPABASE_SERVICE_ROLE_KEY'];

  if (url === undefined || url === '') {
    throw new Error('Supabase URL is required. Set SUPABASE_URL environment variable or pass url in config.');
  }

  if (anonKey === undefined || anonKey === '') {
    throw new Error(
      'Supabase anon key is required. Set SUPABASE_ANON_KEY environment variable or pass anonKey in config.'
    );
  }

  return {
    url,
    anonKey,
    serviceRoleKey: serviceRoleKey === '' ? undefined : serviceRoleKey,
  };
}

export interface SupabaseClientOptions {
  /** Replaces the global fetch for every request the client makes. */
  fetch?: typeof fetch;
}

/**
 * Create a new Supabase client. The service role key is preferred: the sync job
 * reads every user's rows.
 */
export function createSupabaseClient(
  config?: Partial<SupabaseConfig>,
  options: SupabaseClientOptions = {}
): SupabaseClient {
  const { url, anonKey, serviceRoleKey } = getSupabaseConfig(config);

  return createClient(url, serviceRoleKey ?? anonKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    db: {
      schema: 'public',
    },
    // Node 20 has no global WebSocket; the realtime client needs one to construct.
    realtime: {
      transport: WebSocket,
    },
    global: options.fetch !== undefined ? { fetch: options.fetch } : {},
  });
}

export type { SupabaseClient };
