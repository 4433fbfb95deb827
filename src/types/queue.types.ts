import { ItemView } from './item.types';

/**
 * Queue request/response types
 */

export type QueueResult =
  | { status: 'assigned'; item: ItemView; token: string; expiresAt: Date }
  | { status: 'empty' };

export interface QueueProgress {
  completed: number;
  total: number;
}
