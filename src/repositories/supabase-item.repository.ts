import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { Item, ItemCounts, ItemListFilter, ItemState, SupabaseItemRow } from '../types/item.types';
import {
  CommitTerminalParams,
  ReleaseExpiredResult,
  ReleaseParams,
  ReserveParams,
  TransitionFailure,
  TransitionResult,
} from '../types/lease.types';
import { ItemStore } from './item-store';
import { itemStateSchema, labelSelectionSchema } from '../validators/label.validator';
import { createComponentLogger } from '../config/logger';

const itemRowSchema = z.object({
  id: z.coerce.number().int(),
  name: z.string(),
  state: z.string(),
  labels: labelSelectionSchema.nullable(),
  skipped: z.boolean(),
  reservation_token: z.string().nullable(),
  reservation_expires_at: z.string().nullable(),
  updated_at: z.string(),
});

const transitionRowSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), item: itemRowSchema }),
  z.object({ ok: z.literal(false), reason: z.nativeEnum(TransitionFailure) }),
]);

const countsRowSchema = z.object({
  pending: z.coerce.number(),
  reserved_live: z.coerce.number(),
  done: z.coerce.number(),
  total: z.coerce.number(),
});

const idRowSchema = z.object({ id: z.coerce.number().int() });

/**
 * Supabase Item Repository
 *
 * Token-gated transitions run inside PL/pgSQL functions (see
 * supabase/migrations/001_label_queue.sql) so each is one transaction;
 * reservation selection uses SELECT ... FOR UPDATE SKIP LOCKED.
 */
export class SupabaseItemRepository implements ItemStore {
  private readonly log = createComponentLogger('supabase-store');

  constructor(private client: SupabaseClient) {}

  async upsertIfAbsent(name: string, now: Date): Promise<Item> {
    const { data, error } = await this.client.rpc('upsert_item_if_absent', {
      p_name: name,
      p_now: now.toISOString(),
    });

    if (error) {
      this.log.error('Failed to upsert item', { name, error: error.message });
      throw new Error(`Failed to upsert item: ${error.message}`);
    }

    const [row] = z.array(itemRowSchema).parse(data);
    if (!row) {
      throw new Error(`Item ${name} missing after upsert`);
    }

    return this.mapToItem(row);
  }

  async tryReserve(params: ReserveParams): Promise<Item | null> {
    const { data, error } = await this.client.rpc('reserve_next_item', {
      p_token: params.token,
      p_now: params.now.toISOString(),
      p_expires_at: params.expiresAt.toISOString(),
    });

    if (error) {
      this.log.error('Failed to reserve item', { error: error.message, code: error.code });
      throw new Error(`Failed to reserve item: ${error.message}`);
    }

    const [row] = z.array(itemRowSchema).parse(data);
    if (!row) {
      this.log.debug('No eligible item to reserve');
      return null;
    }

    return this.mapToItem(row);
  }

  async commitTerminal(params: CommitTerminalParams): Promise<TransitionResult> {
    const { data, error } = await this.client.rpc('commit_item_terminal', {
      p_id: params.id,
      p_token: params.token,
      p_labels: params.skipped ? null : params.labels,
      p_skipped: params.skipped,
      p_now: params.now.toISOString(),
    });

    if (error) {
      this.log.error('Failed to commit item', { id: params.id, error: error.message });
      throw new Error(`Failed to commit item: ${error.message}`);
    }

    return this.mapToTransition(data);
  }

  async release(params: ReleaseParams): Promise<TransitionResult> {
    const { data, error } = await this.client.rpc('release_item', {
      p_id: params.id,
      p_token: params.token,
      p_now: params.now.toISOString(),
    });

    if (error) {
      this.log.error('Failed to release item', { id: params.id, error: error.message });
      throw new Error(`Failed to release item: ${error.message}`);
    }

    return this.mapToTransition(data);
  }

  async counts(now: Date): Promise<ItemCounts> {
    const { data, error } = await this.client.rpc('item_counts', { p_now: now.toISOString() });

    if (error) {
      this.log.error('Failed to count items', { error: error.message });
      throw new Error(`Failed to count items: ${error.message}`);
    }

    const [row] = z.array(countsRowSchema).parse(data);
    if (!row) {
      throw new Error('Item counts query returned no row');
    }

    return {
      pending: row.pending,
      reservedLive: row.reserved_live,
      done: row.done,
      total: row.total,
    };
  }

  async findById(id: number): Promise<Item | null> {
    const { data, error } = await this.client.from('items').select('*').eq('id', id).single();

    if (error) {
      if (error.code === 'PGRST116') return null; // Not found
      this.log.error('Failed to find item', { id, error: error.message });
      throw new Error(`Failed to find item: ${error.message}`);
    }

    return this.mapToItem(itemRowSchema.parse(data));
  }

  async list(filter: ItemListFilter): Promise<Item[]> {
    let query = this.client.from('items').select('*').order('id', { ascending: true });

    if (filter.state) {
      query = query.eq('state', filter.state);
    }
    if (filter.limit !== undefined && filter.limit > 0) {
      query = query.limit(filter.limit);
    }

    const { data, error } = await query;

    if (error) {
      this.log.error('Failed to list items', { error: error.message });
      throw new Error(`Failed to list items: ${error.message}`);
    }

    return z
      .array(itemRowSchema)
      .parse(data)
      .map((row) => this.mapToItem(row));
  }

  async releaseExpired(now: Date): Promise<ReleaseExpiredResult> {
    const nowIso = now.toISOString();
    const { data, error } = await this.client
      .from('items')
      .update({
        state: ItemState.PENDING,
        reservation_token: null,
        reservation_expires_at: null,
        updated_at: nowIso,
      })
      .eq('state', ItemState.RESERVED)
      .lte('reservation_expires_at', nowIso)
      .select('id');

    if (error) {
      this.log.error('Failed to release expired reservations', { error: error.message });
      throw new Error(`Failed to release expired reservations: ${error.message}`);
    }

    const releasedItemIds = z
      .array(idRowSchema)
      .parse(data)
      .map((row) => row.id)
      .sort((a, b) => a - b);

    return {
      releasedCount: releasedItemIds.length,
      releasedItemIds,
    };
  }

  async releaseAll(now: Date): Promise<number> {
    const { data, error } = await this.client
      .from('items')
      .update({
        state: ItemState.PENDING,
        reservation_token: null,
        reservation_expires_at: null,
        updated_at: now.toISOString(),
      })
      .eq('state', ItemState.RESERVED)
      .select('id');

    if (error) {
      this.log.error('Failed to release reservations', { error: error.message });
      throw new Error(`Failed to release reservations: ${error.message}`);
    }

    return z.array(idRowSchema).parse(data).length;
  }

  async ping(): Promise<void> {
    const { error } = await this.client.from('items').select('id').limit(1);

    if (error) {
      throw new Error(`Database connection failed: ${error.message}`);
    }
  }

  async close(): Promise<void> {
    // Supabase client doesn't have an explicit close method
    this.log.info('Supabase item store closed');
  }

  private mapToTransition(data: unknown): TransitionResult {
    const result = transitionRowSchema.parse(data);
    if (!result.ok) {
      return { ok: false, reason: result.reason };
    }
    return { ok: true, item: this.mapToItem(result.item) };
  }

  /**
   * Map database row to domain model
   */
  private mapToItem(row: SupabaseItemRow): Item {
    const state = itemStateSchema.parse(row.state);

    return {
      id: row.id,
      name: row.name,
      state,
      skipped: row.skipped,
      labels: row.labels ?? {},
      reservation:
        state === ItemState.RESERVED && row.reservation_token !== null && row.reservation_expires_at !== null
          ? { token: row.reservation_token, expiresAt: new Date(row.reservation_expires_at) }
          : null,
      updatedAt: new Date(row.updated_at),
    };
  }
}
