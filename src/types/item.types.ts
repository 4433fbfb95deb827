/**
 * Item domain types
 */

// Item lifecycle: PENDING -> RESERVED -> DONE, RESERVED -> PENDING on expiry or release
export enum ItemState {
  PENDING = 'PENDING',
  RESERVED = 'RESERVED',
  DONE = 'DONE',
}

// Category id -> selected label ids
export type LabelSelection = Record<string, string[]>;

export interface Reservation {
  token: string;
  expiresAt: Date;
}

export interface Item {
  id: number;
  name: string;
  state: ItemState;
  skipped: boolean;
  labels: LabelSelection;
  reservation: Reservation | null;
  updatedAt: Date;
}

// Database row type (SQLite stores timestamps as epoch milliseconds)
export interface SqliteItemRow {
  id: number;
  name: string;
  state: string;
  labels_json: string | null;
  skipped: number;
  reservation_token: string | null;
  reservation_expires_at: number | null;
  updated_at: number;
}

// Database row type (PostgreSQL via Supabase)
export interface SupabaseItemRow {
  id: number;
  name: string;
  state: string;
  labels: LabelSelection | null;
  skipped: boolean;
  reservation_token: string | null;
  reservation_expires_at: string | null;
  updated_at: string;
}

// What a client sees of an item; never carries reservation metadata
export interface ItemView {
  id: number;
  name: string;
  reference: string;
}

// Records view (reporting); token deliberately omitted
export interface ItemRecord {
  id: number;
  name: string;
  state: ItemState;
  labels: LabelSelection;
  skipped: boolean;
  updatedAt: Date;
}

export interface ItemCounts {
  pending: number;
  reservedLive: number;
  done: number;
  total: number;
}

export interface ItemListFilter {
  state?: ItemState;
  limit?: number;
}
