import { ItemStore } from '../repositories/item-store';
import { Item, ItemListFilter, ItemRecord } from '../types/item.types';
import { AppError, ErrorCode } from '../types/error.types';
import { logger } from '../config/logger';

/**
 * Item Service
 *
 * Read-only records view over the store. Reservation tokens never leave this layer.
 */
export class ItemService {
  constructor(private store: ItemStore) {}

  /**
   * Get item by ID
   */
  async getItem(id: number): Promise<ItemRecord> {
    logger.debug('Getting item', { id });

    const item = await this.store.findById(id);

    if (!item) {
      throw new AppError(ErrorCode.ITEM_NOT_FOUND, `Item with ID ${id} not found`, 404);
    }

    return toRecord(item);
  }

  /**
   * List items ordered by id, optionally filtered by state
   */
  async listItems(filter: ItemListFilter): Promise<ItemRecord[]> {
    logger.debug('Listing items', filter);

    const items = await this.store.list(filter);
    return items.map(toRecord);
  }
}

export function toRecord(item: Item): ItemRecord {
  return {
    id: item.id,
    name: item.name,
    state: item.state,
    labels: item.labels,
    skipped: item.skipped,
    updatedAt: item.updatedAt,
  };
}
