import path from 'path';
import { ItemStore } from './repositories/item-store';
import { SqliteItemRepository } from './repositories/sqlite-item.repository';
import { SupabaseItemRepository } from './repositories/supabase-item.repository';
import { LeaseManager } from './services/lease-manager.service';
import { QueueService } from './services/queue.service';
import { ItemService } from './services/item.service';
import { CatalogService } from './services/catalog.service';
import { MaintenanceService } from './services/maintenance.service';
import { Taxonomy } from './types/taxonomy.types';
import { Clock, systemClock } from './utils/clock';
import { env, Environment, LEASE_DURATION_MS } from './config/environment';
import { getSupabaseClient, openSqliteDatabase } from './config/database';
import { loadTaxonomy } from './config/taxonomy';
import { logger } from './config/logger';

export type StoreDriver = Environment['STORE_DRIVER'];

export interface ContainerOptions {
  store: ItemStore;
  storeDriver: StoreDriver;
  taxonomy: Taxonomy;
  imageDirectory: string;
  leaseDurationMs: number;
  syncOnNext: boolean;
  strictLabels: boolean;
  clock?: Clock;
}

/**
 * Everything the HTTP layer and the entry point need, built once per process
 */
export interface AppContainer {
  store: ItemStore;
  storeDriver: StoreDriver;
  taxonomy: Taxonomy;
  leaseManager: LeaseManager;
  queueService: QueueService;
  itemService: ItemService;
  catalogService: CatalogService;
  maintenanceService: MaintenanceService;
}

export function createContainer(options: ContainerOptions): AppContainer {
  const clock = options.clock ?? systemClock;
  const catalogService = new CatalogService(options.store, options.imageDirectory, clock);
  const leaseManager = new LeaseManager(options.store, {
    leaseDurationMs: options.leaseDurationMs,
    clock,
  });

  return {
    store: options.store,
    storeDriver: options.storeDriver,
    taxonomy: options.taxonomy,
    leaseManager,
    queueService: new QueueService(leaseManager, options.store, {
      clock,
      source: options.syncOnNext ? catalogService : null,
      taxonomy: options.taxonomy,
      strictLabels: options.strictLabels,
    }),
    itemService: new ItemService(options.store),
    catalogService,
    maintenanceService: new MaintenanceService(options.store, clock),
  };
}

/**
 * Open the item store selected by STORE_DRIVER
 */
export function openItemStore(driver: StoreDriver = env.STORE_DRIVER): ItemStore {
  if (driver === 'supabase') {
    return new SupabaseItemRepository(getSupabaseClient());
  }
  return new SqliteItemRepository(openSqliteDatabase(env.SQLITE_PATH));
}

/**
 * IMAGE_DIRECTORY wins over the taxonomy file's image_directory; relative
 * paths resolve against the taxonomy file's directory, as config.json expects
 */
export function resolveImageDirectory(taxonomy: Taxonomy, taxonomyPath: string = env.TAXONOMY_PATH): string {
  if (env.IMAGE_DIRECTORY) {
    return path.resolve(env.IMAGE_DIRECTORY);
  }
  return path.resolve(path.dirname(path.resolve(taxonomyPath)), taxonomy.imageDirectory ?? 'images');
}

/**
 * Hand every lease back and close the store
 */
export async function shutdownContainer(container: AppContainer): Promise<void> {
  await container.maintenanceService.releaseAll();
  await container.store.close();
}

export async function createContainerFromEnv(): Promise<AppContainer> {
  const taxonomy = await loadTaxonomy(env.TAXONOMY_PATH);
  const leaseDurationMs =
    taxonomy.leaseDurationSeconds !== null ? taxonomy.leaseDurationSeconds * 1000 : LEASE_DURATION_MS;
  const imageDirectory = resolveImageDirectory(taxonomy);

  logger.info('Building application container', {
    store: env.STORE_DRIVER,
    imageDirectory,
    leaseDurationSeconds: leaseDurationMs / 1000,
  });

  return createContainer({
    store: openItemStore(env.STORE_DRIVER),
    storeDriver: env.STORE_DRIVER,
    taxonomy,
    imageDirectory,
    leaseDurationMs,
    syncOnNext: env.SYNC_ON_NEXT,
    strictLabels: env.STRICT_LABELS && taxonomy.categories.length > 0,
  });
}
