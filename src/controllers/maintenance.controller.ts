import { Request, Response } from 'express';
import { MaintenanceService } from '../services/maintenance.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';

/**
 * Maintenance Controller
 *
 * HTTP request handlers for maintenance endpoints
 */
export class MaintenanceController {
  constructor(private maintenanceService: MaintenanceService) {}

  /**
   * POST /v1/maintenance/release-expired
   * Revert expired reservations to pending
   */
  releaseExpired = asyncHandler(async (_req: Request, res: Response) => {
    const result = await this.maintenanceService.releaseExpired();

    res
      .status(200)
      .json(
        createSuccessResponse(result, `Released ${result.releasedCount} expired reservations`)
      );
  });
}
