import { Router } from 'express';
import { ItemController } from '../../controllers/item.controller';
import { validate } from '../../middleware/validation.middleware';
import { getItemSchema, listItemsSchema } from '../../validators/item.validator';

/**
 * Item routes (v1)
 */
export function createItemsRouter(itemController: ItemController): Router {
  const router = Router();

  /**
   * @swagger
   * /v1/items:
   *   get:
   *     summary: List item records
   *     tags: [Items]
   *     parameters:
   *       - in: query
   *         name: state
   *         schema:
   *           type: string
   *           enum: [PENDING, RESERVED, DONE]
   *       - in: query
   *         name: limit
   *         schema:
   *           type: integer
   *           minimum: 1
   *     responses:
   *       200:
   *         description: Items ordered by id
   */
  router.get('/', validate(listItemsSchema), itemController.listItems);

  /**
   * @swagger
   * /v1/items/{id}:
   *   get:
   *     summary: Get an item record
   *     tags: [Items]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Item retrieved successfully
   *       404:
   *         description: Item not found
   */
  router.get('/:id', validate(getItemSchema), itemController.getItem);

  return router;
}
