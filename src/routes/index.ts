import { Router } from 'express';
import { AppContainer } from '../container';
import { QueueController } from '../controllers/queue.controller';
import { ItemController } from '../controllers/item.controller';
import { MaintenanceController } from '../controllers/maintenance.controller';
import { CatalogController } from '../controllers/catalog.controller';
import { createQueueRouter } from './v1/queue.routes';
import { createItemsRouter } from './v1/items.routes';
import { createMaintenanceRouter } from './v1/maintenance.routes';
import { createImagesRouter, createTaxonomyRouter } from './v1/catalog.routes';
import { HealthCheckResponse } from '../types/api.types';
import { asyncHandler } from '../utils/async-handler';
import { createComponentLogger } from '../config/logger';

const log = createComponentLogger('routes');

/**
 * API Routes Aggregator
 */
export function createRoutes(container: AppContainer): Router {
  const router = Router();

  const queueController = new QueueController(container.queueService);
  const itemController = new ItemController(container.itemService);
  const maintenanceController = new MaintenanceController(container.maintenanceService);
  const catalogController = new CatalogController(container.catalogService, container.taxonomy);

  // v1 routes
  router.use('/v1/queue', createQueueRouter(queueController));
  router.use('/v1/items', createItemsRouter(itemController));
  router.use('/v1/taxonomy', createTaxonomyRouter(catalogController));
  router.use('/v1/maintenance', createMaintenanceRouter(maintenanceController));
  router.use('/images', createImagesRouter(catalogController));

  // Health check endpoint
  router.get(
    '/health',
    asyncHandler(async (_req, res) => {
      const body = (status: HealthCheckResponse['status']): HealthCheckResponse => ({
        status,
        timestamp: new Date().toISOString(),
        store: container.storeDriver,
        uptime: process.uptime(),
      });

      try {
        await container.store.ping();
        res.status(200).json(body('healthy'));
      } catch (error) {
        log.error('Health check failed', { error: error instanceof Error ? error.message : String(error) });
        res.status(503).json(body('unhealthy'));
      }
    })
  );

  // API version info
  router.get('/v1', (_req, res) => {
    res.status(200).json({
      version: '1.0.0',
      api: 'Label Queue API',
    });
  });

  return router;
}
