import { Router } from 'express';
import { MaintenanceController } from '../../controllers/maintenance.controller';

/**
 * Maintenance routes (v1)
 */
export function createMaintenanceRouter(maintenanceController: MaintenanceController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/maintenance/release-expired:
   *   post:
   *     summary: Revert expired reservations to pending
   *     tags: [Maintenance]
   *     responses:
   *       200:
   *         description: Expired reservations released
   */
  router.post('/release-expired', maintenanceController.releaseExpired);

  return router;
}
