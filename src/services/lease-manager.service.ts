import { ItemStore } from '../repositories/item-store';
import { Item, LabelSelection } from '../types/item.types';
import { Lease, TransitionFailure } from '../types/lease.types';
import { AppError, ErrorCode } from '../types/error.types';
import { Clock, systemClock } from '../utils/clock';
import { generateLeaseToken } from '../utils/token';
import { createComponentLogger } from '../config/logger';

export interface LeaseManagerOptions {
  leaseDurationMs: number;
  clock?: Clock;
  generateToken?: () => string;
}

export const RESERVATION_INVALID_MESSAGE = 'Reservation is no longer valid. Fetch a new item.';

/**
 * Lease Manager
 *
 * Issues reservations with a fresh token and a fixed expiry, and gates every
 * terminal write on that token. Expiry is lazy: an expired reservation is
 * simply eligible again on the next acquire, so no sweeper is involved.
 */
export class LeaseManager {
  private readonly log = createComponentLogger('lease');
  private readonly clock: Clock;
  private readonly generateToken: () => string;
  readonly leaseDurationMs: number;

  constructor(
    private store: ItemStore,
    options: LeaseManagerOptions
  ) {
    if (!Number.isInteger(options.leaseDurationMs) || options.leaseDurationMs <= 0) {
      throw new Error(`Lease duration must be a positive integer of milliseconds, got ${options.leaseDurationMs}`);
    }

    this.leaseDurationMs = options.leaseDurationMs;
    this.clock = options.clock ?? systemClock;
    this.generateToken = options.generateToken ?? generateLeaseToken;
  }

  /**
   * Reserve the next eligible item, or null when every item is done or leased
   */
  async acquire(): Promise<Lease | null> {
    const now = this.clock.now();
    const token = this.generateToken();
    const expiresAt = new Date(now.getTime() + this.leaseDurationMs);

    const item = await this.store.tryReserve({ token, now, expiresAt });
    if (!item) {
      return null;
    }

    this.log.info('Lease issued', { itemId: item.id, expiresAt: expiresAt.toISOString() });
    return { item, token, expiresAt };
  }

  /**
   * Commit the terminal state for a live lease
   *
   * Every refusal (unknown item, wrong token, already done, expired) surfaces
   * as RESERVATION_INVALID; the specific reason rides along in details.
   */
  async validateAndFinish(
    id: number,
    token: string,
    labels: LabelSelection,
    skipped: boolean
  ): Promise<Item> {
    const result = await this.store.commitTerminal({
      id,
      token,
      labels: skipped ? {} : labels,
      skipped,
      now: this.clock.now(),
    });

    if (!result.ok) {
      throw this.reservationInvalid(id, result.reason);
    }

    this.log.info(skipped ? 'Item skipped' : 'Item completed', { itemId: id });
    return result.item;
  }

  /**
   * Give a live lease back before it expires
   */
  async release(id: number, token: string): Promise<Item> {
    const result = await this.store.release({ id, token, now: this.clock.now() });

    if (!result.ok) {
      throw this.reservationInvalid(id, result.reason);
    }

    this.log.info('Lease released', { itemId: id });
    return result.item;
  }

  private reservationInvalid(id: number, reason: TransitionFailure): AppError {
    this.log.debug('Reservation rejected', { itemId: id, reason });
    return new AppError(ErrorCode.RESERVATION_INVALID, RESERVATION_INVALID_MESSAGE, 409, {
      itemId: id,
      reason,
    });
  }
}
