import fs from 'fs/promises';
import path from 'path';
import { ItemStore } from '../repositories/item-store';
import { ItemSource } from './queue.service';
import { Clock, systemClock } from '../utils/clock';
import { createComponentLogger } from '../config/logger';

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg',
  '.jpeg',
  '.png',
  '.bmp',
  '.gif',
  '.webp',
]);

export interface CatalogSyncResult {
  scanned: number;
  // Names handed to the store for the first time by this process; the store
  // keeps rows it already has
  registered: number;
}

// Hidden files are never catalogued or served
const isHidden = (name: string): boolean => name.startsWith('.');

/**
 * Catalog Service
 *
 * Discovers image files in a directory and registers each one with the store.
 * Dot-prefixed files are ignored.
 * Names already registered by this process are remembered, so a sync only
 * writes for files it has not seen; items are never deleted, which keeps that
 * memory from going stale.
 */
export class CatalogService implements ItemSource {
  private readonly log = createComponentLogger('catalog');
  private readonly knownNames = new Set<string>();
  readonly directory: string;

  constructor(
    private store: ItemStore,
    directory: string,
    private clock: Clock = systemClock
  ) {
    this.directory = path.resolve(directory);
  }

  async sync(): Promise<CatalogSyncResult> {
    await fs.mkdir(this.directory, { recursive: true });

    const entries = await fs.readdir(this.directory, { withFileTypes: true });
    const names = entries
      .filter(
        (entry) =>
          entry.isFile() && !isHidden(entry.name) && IMAGE_EXTENSIONS.has(path.extname(entry.name).toLowerCase())
      )
      .map((entry) => entry.name)
      .sort();

    let registered = 0;
    for (const name of names) {
      if (this.knownNames.has(name)) continue;
      await this.store.upsertIfAbsent(name, this.clock.now());
      this.knownNames.add(name);
      registered++;
    }

    if (registered > 0) {
      this.log.info('Catalog synced', { scanned: names.length, registered });
    }

    return { scanned: names.length, registered };
  }

  /**
   * Absolute path of an image inside the catalog directory, or null when the
   * name escapes the directory, is hidden, or is not a regular file
   */
  async resolveImagePath(filename: string): Promise<string | null> {
    if (isHidden(path.basename(filename))) {
      return null;
    }

    const candidate = path.resolve(this.directory, filename);
    const relative = path.relative(this.directory, candidate);

    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      return null;
    }

    try {
      const stat = await fs.stat(candidate);
      return stat.isFile() ? candidate : null;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}
