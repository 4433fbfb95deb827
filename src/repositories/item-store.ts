import { Item, ItemCounts, ItemListFilter, ItemState } from '../types/item.types';
import {
  CommitTerminalParams,
  ReleaseExpiredResult,
  ReleaseParams,
  ReserveParams,
  TransitionFailure,
  TransitionResult,
} from '../types/lease.types';

/**
 * Item Store
 *
 * Durable record of every work item. Each method is one atomic unit against
 * the backing database; callers never need their own locking.
 */
export interface ItemStore {
  /** Insert a PENDING item stamped `now` unless the name is already known; returns the stored row. */
  upsertIfAbsent(name: string, now: Date): Promise<Item>;

  /**
   * Reserve the lowest-id item that is PENDING or holds an expired reservation.
   * Returns null when nothing is eligible.
   */
  tryReserve(params: ReserveParams): Promise<Item | null>;

  /** Move a live reservation to DONE, clearing the reservation metadata. */
  commitTerminal(params: CommitTerminalParams): Promise<TransitionResult>;

  /** Move a live reservation back to PENDING. */
  release(params: ReleaseParams): Promise<TransitionResult>;

  /** Expired reservations count as pending. */
  counts(now: Date): Promise<ItemCounts>;

  findById(id: number): Promise<Item | null>;

  list(filter: ItemListFilter): Promise<Item[]>;

  /** Revert every expired reservation to PENDING. */
  releaseExpired(now: Date): Promise<ReleaseExpiredResult>;

  /** Revert every reservation to PENDING, live or not; returns the number of rows changed. */
  releaseAll(now: Date): Promise<number>;

  ping(): Promise<void>;

  close(): Promise<void>;
}

/**
 * Why a token check against `item` fails at `now`, or null if the reservation is live
 */
export function reservationFailure(
  item: Item | null,
  token: string,
  now: Date
): TransitionFailure | null {
  if (!item) return TransitionFailure.NOT_FOUND;
  if (item.state === ItemState.DONE) return TransitionFailure.ALREADY_DONE;
  if (item.state !== ItemState.RESERVED || !item.reservation) return TransitionFailure.NOT_RESERVED;
  if (item.reservation.token !== token) return TransitionFailure.TOKEN_MISMATCH;
  if (item.reservation.expiresAt.getTime() <= now.getTime()) return TransitionFailure.EXPIRED;
  return null;
}
