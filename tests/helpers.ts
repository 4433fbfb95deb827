import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { SqliteItemRepository } from '../src/repositories/sqlite-item.repository';
import { openSqliteDatabase } from '../src/config/database';

export const T0 = new Date('2024-01-01T00:00:00.000Z');

export const at = (ms: number): Date => new Date(T0.getTime() + ms);

export function createTestStore(): SqliteItemRepository {
  return new SqliteItemRepository(openSqliteDatabase(':memory:'));
}

export async function seed(store: SqliteItemRepository, names: string[]): Promise<void> {
  for (const name of names) {
    await store.upsertIfAbsent(name, T0);
  }
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'label-queue-'));
}

/**
 * Token generator yielding "token-1", "token-2", ...
 */
export function sequentialTokens(): () => string {
  let counter = 0;
  return () => `token-${++counter}`;
}
