import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { logger } from './logger';
import { env } from './environment';
import { SQLITE_SCHEMA } from '../database/sqlite-schema';

// Singleton Supabase client instance
let supabaseClient: SupabaseClient | null = null;

/**
 * Get or create Supabase client instance (singleton pattern)
 *
 * Configuration:
 * - Uses service role key for admin access (bypasses RLS)
 * - Disables auth (no user sessions needed for API-only application)
 */
export const getSupabaseClient = (): SupabaseClient => {
  if (!supabaseClient) {
    if (!env.SUPABASE_URL || !env.SUPABASE_SERVICE_ROLE_KEY) {
      throw new Error('Supabase credentials are not configured');
    }

    supabaseClient = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
      db: {
        schema: 'public',
      },
    });

    logger.info('Supabase client initialized', {
      url: env.SUPABASE_URL,
      schema: 'public',
    });
  }

  return supabaseClient;
};

/**
 * Open a SQLite database and make sure the items schema exists
 *
 * WAL lets the progress reads run beside a writer; busy_timeout makes a second
 * process wait for the write lock instead of failing with SQLITE_BUSY.
 */
export const openSqliteDatabase = (filename: string = env.SQLITE_PATH): Database.Database => {
  const inMemory = filename === ':memory:';

  if (!inMemory) {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const db = new Database(filename);
  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 30000');
  db.exec(SQLITE_SCHEMA);

  logger.info('SQLite database opened', { filename });
  return db;
};
