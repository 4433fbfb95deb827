import { Item, LabelSelection } from './item.types';

/**
 * Lease and store transition types
 */

export interface Lease {
  item: Item;
  token: string;
  expiresAt: Date;
}

// Store reservation params (token and expiry chosen by the lease manager)
export interface ReserveParams {
  token: string;
  now: Date;
  expiresAt: Date;
}

export interface CommitTerminalParams {
  id: number;
  token: string;
  labels: LabelSelection;
  skipped: boolean;
  now: Date;
}

export interface ReleaseParams {
  id: number;
  token: string;
  now: Date;
}

// Why a token-gated transition was refused
export enum TransitionFailure {
  NOT_FOUND = 'NOT_FOUND',
  NOT_RESERVED = 'NOT_RESERVED',
  ALREADY_DONE = 'ALREADY_DONE',
  TOKEN_MISMATCH = 'TOKEN_MISMATCH',
  EXPIRED = 'EXPIRED',
}

export type TransitionResult =
  | { ok: true; item: Item }
  | { ok: false; reason: TransitionFailure };

export interface ReleaseExpiredResult {
  releasedCount: number;
  releasedItemIds: number[];
}
