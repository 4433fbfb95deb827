import { Request, Response } from 'express';
import { QueueService } from '../services/queue.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../middleware/validation.middleware';
import { releaseSchema, skipSchema, submitSchema } from '../validators/queue.validator';

/**
 * Queue Controller
 *
 * HTTP request handlers for queue endpoints
 */
export class QueueController {
  constructor(private queueService: QueueService) {}

  /**
   * GET /v1/queue/next
   * Reserve the next item for the caller
   */
  next = asyncHandler(async (_req: Request, res: Response) => {
    const result = await this.queueService.next();

    res.status(200).json(createSuccessResponse(result));
  });

  /**
   * POST /v1/queue/submit
   * Save labels for a reserved item
   */
  submit = asyncHandler(async (req: Request, res: Response) => {
    const { item_id, token, labels } = parseRequest(submitSchema, req).body;

    await this.queueService.submit(item_id, token, labels);

    res.status(200).json(createSuccessResponse({ itemId: item_id, skipped: false }, 'Labels saved'));
  });

  /**
   * POST /v1/queue/skip
   * Finish a reserved item without labels
   */
  skip = asyncHandler(async (req: Request, res: Response) => {
    const { item_id, token } = parseRequest(skipSchema, req).body;

    await this.queueService.skip(item_id, token);

    res.status(200).json(createSuccessResponse({ itemId: item_id, skipped: true }, 'Item skipped'));
  });

  /**
   * POST /v1/queue/release
   * Give a reserved item back before its lease expires
   */
  release = asyncHandler(async (req: Request, res: Response) => {
    const { item_id, token } = parseRequest(releaseSchema, req).body;

    await this.queueService.release(item_id, token);

    res.status(200).json(createSuccessResponse({ itemId: item_id }, 'Reservation released'));
  });

  /**
   * GET /v1/queue/progress
   * Completed and total item counts
   */
  progress = asyncHandler(async (_req: Request, res: Response) => {
    const progress = await this.queueService.progress();

    res.status(200).json(createSuccessResponse(progress));
  });
}
