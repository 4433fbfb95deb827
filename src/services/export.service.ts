import fs from 'fs/promises';
import path from 'path';
import { ItemStore } from '../repositories/item-store';
import { ItemState, LabelSelection } from '../types/item.types';
import { sortSelection } from '../validators/label.validator';
import { logger } from '../config/logger';

export interface ExportOptions {
  overwrite: boolean;
}

export interface ExportResult {
  exported: number;
  skipped: number;
}

/**
 * Label Export Service
 *
 * Writes each completed item's labels to a `<basename>.json` sidecar next to
 * its image.
 */
export class LabelExportService {
  constructor(
    private store: ItemStore,
    private imageDirectory: string
  ) {}

  async exportSidecars(options: ExportOptions): Promise<ExportResult> {
    const items = await this.store.list({ state: ItemState.DONE });
    const result: ExportResult = { exported: 0, skipped: 0 };

    for (const item of items) {
      if (item.skipped || Object.keys(item.labels).length === 0) {
        result.skipped++;
        continue;
      }

      const sidecar = sidecarPath(this.imageDirectory, item.name);
      await fs.mkdir(path.dirname(sidecar), { recursive: true });

      if (!options.overwrite && (await exists(sidecar))) {
        result.skipped++;
        continue;
      }

      await fs.writeFile(sidecar, formatLabels(item.labels), 'utf-8');
      result.exported++;
    }

    logger.info('Label export complete', { ...result });
    return result;
  }
}

export function sidecarPath(imageDirectory: string, name: string): string {
  const parsed = path.parse(name);
  return path.join(imageDirectory, parsed.dir, `${parsed.name}.json`);
}

/**
 * Pretty JSON with sorted category keys and a trailing newline
 */
export function formatLabels(labels: LabelSelection): string {
  return `${JSON.stringify(sortSelection(labels), null, 2)}\n`;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
