import { openItemStore, resolveImageDirectory } from '../src/container';
import { env } from '../src/config/environment';
import { loadTaxonomy } from '../src/config/taxonomy';
import { logger } from '../src/config/logger';
import { LabelExportService } from '../src/services/export.service';

/**
 * Label Export Script
 *
 * Writes `<image>.json` next to every labelled image.
 *
 * Usage: npm run export:labels -- [--skip-existing]
 */
async function main(): Promise<void> {
  const overwrite = !process.argv.includes('--skip-existing');

  const taxonomy = await loadTaxonomy(env.TAXONOMY_PATH);
  const imageDirectory = resolveImageDirectory(taxonomy);
  const store = openItemStore(env.STORE_DRIVER);

  try {
    const exporter = new LabelExportService(store, imageDirectory);
    const { exported, skipped } = await exporter.exportSidecars({ overwrite });
    console.log(`✓ Exported ${exported} label files to ${imageDirectory} (${skipped} skipped)`);
  } finally {
    await store.close();
  }
}

main().catch((error: unknown) => {
  logger.error('Label export failed', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
