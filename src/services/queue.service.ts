import { ItemStore } from '../repositories/item-store';
import { LeaseManager } from './lease-manager.service';
import { Item, ItemView, LabelSelection } from '../types/item.types';
import { QueueProgress, QueueResult } from '../types/queue.types';
import { Taxonomy } from '../types/taxonomy.types';
import { AppError, ErrorCode } from '../types/error.types';
import { findUnknownLabels } from '../config/taxonomy';
import { Clock, systemClock } from '../utils/clock';
import { createComponentLogger } from '../config/logger';

/**
 * Something that registers newly discovered items with the store
 */
export interface ItemSource {
  sync(): Promise<unknown>;
}

export interface QueueServiceOptions {
  clock?: Clock;
  // Discovery run before every hand-out
  source?: ItemSource | null;
  taxonomy?: Taxonomy | null;
  // Reject labels the taxonomy does not define
  strictLabels?: boolean;
  referenceFor?: (item: Item) => string;
}

export const imageReference = (item: Item): string => `/images/${encodeURIComponent(item.name)}`;

/**
 * Queue Service
 *
 * The client-facing contract: hand out the next item, accept a submission or
 * a skip against the lease token, report progress.
 */
export class QueueService {
  private readonly log = createComponentLogger('queue');
  private readonly clock: Clock;
  private readonly source: ItemSource | null;
  private readonly taxonomy: Taxonomy | null;
  private readonly strictLabels: boolean;
  private readonly referenceFor: (item: Item) => string;

  constructor(
    private leaseManager: LeaseManager,
    private store: ItemStore,
    options: QueueServiceOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.source = options.source ?? null;
    this.taxonomy = options.taxonomy ?? null;
    this.strictLabels = options.strictLabels ?? false;
    this.referenceFor = options.referenceFor ?? imageReference;

    if (this.strictLabels && !this.taxonomy) {
      throw new Error('Strict label checking needs a taxonomy');
    }
  }

  /**
   * Hand out the next item, or report that nothing is available right now.
   * Never waits: callers poll.
   */
  async next(): Promise<QueueResult> {
    if (this.source) {
      await this.source.sync();
    }

    const lease = await this.leaseManager.acquire();
    if (!lease) {
      this.log.debug('Queue empty');
      return { status: 'empty' };
    }

    return {
      status: 'assigned',
      item: this.toView(lease.item),
      token: lease.token,
      expiresAt: lease.expiresAt,
    };
  }

  /**
   * Record labels for a leased item
   */
  async submit(itemId: number, token: string, labels: LabelSelection): Promise<void> {
    const selection = normaliseSelection(labels);

    if (Object.keys(selection).length === 0) {
      throw new AppError(
        ErrorCode.VALIDATION_ERROR,
        'At least one label must be selected to submit.',
        400
      );
    }

    if (this.strictLabels && this.taxonomy) {
      const report = findUnknownLabels(this.taxonomy, selection);
      if (report.unknownCategories.length > 0 || report.unknownLabels.length > 0) {
        throw new AppError(ErrorCode.VALIDATION_ERROR, 'Selection contains unknown labels', 400, {
          unknownCategories: report.unknownCategories,
          unknownLabels: report.unknownLabels,
        });
      }
    }

    await this.leaseManager.validateAndFinish(itemId, token, selection, false);
  }

  /**
   * Finish a leased item without labels
   */
  async skip(itemId: number, token: string): Promise<void> {
    await this.leaseManager.validateAndFinish(itemId, token, {}, true);
  }

  /**
   * Hand a leased item back to the queue before its lease runs out
   */
  async release(itemId: number, token: string): Promise<void> {
    await this.leaseManager.release(itemId, token);
  }

  async progress(): Promise<QueueProgress> {
    const counts = await this.store.counts(this.clock.now());

    return {
      completed: counts.done,
      total: counts.pending + counts.reservedLive + counts.done,
    };
  }

  toView(item: Item): ItemView {
    return {
      id: item.id,
      name: item.name,
      reference: this.referenceFor(item),
    };
  }
}

/**
 * Drop empty categories and duplicate labels, keeping first-seen order
 */
export function normaliseSelection(labels: LabelSelection): LabelSelection {
  const selection: LabelSelection = {};

  for (const [categoryId, labelIds] of Object.entries(labels)) {
    const unique = [...new Set(labelIds)];
    if (unique.length > 0) {
      selection[categoryId] = unique;
    }
  }

  return selection;
}
