import { ItemStore } from '../repositories/item-store';
import { ReleaseExpiredResult } from '../types/lease.types';
import { Clock, systemClock } from '../utils/clock';
import { logger } from '../config/logger';

/**
 * Maintenance Service
 *
 * Bulk reservation housekeeping. Lease expiry needs none of this to be
 * correct; these operations only tidy what the store reports.
 */
export class MaintenanceService {
  constructor(
    private store: ItemStore,
    private clock: Clock = systemClock
  ) {}

  /**
   * Revert every expired reservation to PENDING
   *
   * Safe to run concurrently with acquire/commit: the store only touches rows
   * whose reservation has already lapsed.
   */
  async releaseExpired(): Promise<ReleaseExpiredResult> {
    logger.info('Running release expired reservations job');

    const result = await this.store.releaseExpired(this.clock.now());

    logger.info('Release expired reservations job complete', {
      releasedCount: result.releasedCount,
    });

    return result;
  }

  /**
   * Revert every reservation, live or not. Only for process startup and
   * shutdown, when no outstanding lease can still be honoured.
   */
  async releaseAll(): Promise<number> {
    const released = await this.store.releaseAll(this.clock.now());

    logger.info('Released all reservations', { released });
    return released;
  }
}
