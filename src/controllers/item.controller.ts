import { Request, Response } from 'express';
import { ItemService } from '../services/item.service';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { parseRequest } from '../middleware/validation.middleware';
import { getItemSchema, listItemsSchema } from '../validators/item.validator';

/**
 * Item Controller
 *
 * HTTP request handlers for the item records view
 */
export class ItemController {
  constructor(private itemService: ItemService) {}

  /**
   * GET /v1/items
   * List items, optionally filtered by state
   */
  listItems = asyncHandler(async (req: Request, res: Response) => {
    const { state, limit } = parseRequest(listItemsSchema, req).query;

    const items = await this.itemService.listItems({ state, limit });

    res.status(200).json(createSuccessResponse(items));
  });

  /**
   * GET /v1/items/:id
   * Get a single item record
   */
  getItem = asyncHandler(async (req: Request, res: Response) => {
    const { id } = parseRequest(getItemSchema, req).params;

    const item = await this.itemService.getItem(id);

    res.status(200).json(createSuccessResponse(item));
  });
}
