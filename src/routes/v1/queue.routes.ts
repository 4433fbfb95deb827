import { Router } from 'express';
import { QueueController } from '../../controllers/queue.controller';
import { validate } from '../../middleware/validation.middleware';
import { releaseSchema, skipSchema, submitSchema } from '../../validators/queue.validator';

/**
 * Queue routes (v1)
 */
export function createQueueRouter(queueController: QueueController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/queue/next:
   *   get:
   *     summary: Reserve the next item
   *     description: >
   *       Returns an item with a lease token, or status "empty" when every item
   *       is done or leased by another client. Never waits; poll to retry.
   *     tags: [Queue]
   *     responses:
   *       200:
   *         description: Assigned item or empty queue
   */
  router.get('/next', queueController.next);

  /**
   * @swagger
   * /v1/queue/submit:
   *   post:
   *     summary: Save labels for a reserved item
   *     tags: [Queue]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - item_id
   *               - token
   *               - labels
   *             properties:
   *               item_id:
   *                 type: integer
   *               token:
   *                 type: string
   *               labels:
   *                 type: object
   *                 additionalProperties:
   *                   type: array
   *                   items:
   *                     type: string
   *     responses:
   *       200:
   *         description: Labels saved
   *       400:
   *         description: No label selected
   *       409:
   *         description: Reservation invalid or expired; fetch a new item
   */
  router.post('/submit', validate(submitSchema), queueController.submit);

  /**
   * @swagger
   * /v1/queue/skip:
   *   post:
   *     summary: Finish a reserved item without labels
   *     tags: [Queue]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/LeaseReference'
   *     responses:
   *       200:
   *         description: Item skipped
   *       409:
   *         description: Reservation invalid or expired; fetch a new item
   */
  router.post('/skip', validate(skipSchema), queueController.skip);

  /**
   * @swagger
   * /v1/queue/release:
   *   post:
   *     summary: Return a reserved item to the queue
   *     tags: [Queue]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             $ref: '#/components/schemas/LeaseReference'
   *     responses:
   *       200:
   *         description: Reservation released
   *       409:
   *         description: Reservation invalid or expired
   */
  router.post('/release', validate(releaseSchema), queueController.release);

  /**
   * @swagger
   * /v1/queue/progress:
   *   get:
   *     summary: Completed and total item counts
   *     tags: [Queue]
   *     responses:
   *       200:
   *         description: Progress counts
   */
  router.get('/progress', queueController.progress);

  return router;
}
