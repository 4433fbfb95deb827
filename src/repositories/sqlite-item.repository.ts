import type { Database, Statement } from 'better-sqlite3';
import { Item, ItemCounts, ItemListFilter, ItemState, SqliteItemRow } from '../types/item.types';
import {
  CommitTerminalParams,
  ReleaseExpiredResult,
  ReleaseParams,
  ReserveParams,
  TransitionResult,
} from '../types/lease.types';
import { ItemStore, reservationFailure } from './item-store';
import { itemStateSchema, parseStoredLabels, serializeLabels } from '../validators/label.validator';
import { createComponentLogger } from '../config/logger';

interface CountsRow {
  pending: number;
  reserved_live: number;
  done: number;
  total: number;
}

interface TerminalBindings {
  id: number;
  token: string;
  labels: string | null;
  skipped: number;
  now: number;
}

interface TokenBindings {
  id: number;
  token: string;
  now: number;
}

interface ReserveBindings {
  token: string;
  expiresAt: number;
  now: number;
}

interface NowBindings {
  now: number;
}

interface ListBindings {
  state: string | null;
  limit: number;
}

const ELIGIBLE_PREDICATE = `
  state = 'PENDING'
  OR (state = 'RESERVED' AND reservation_expires_at <= @now)
`;

/**
 * SQLite Item Repository
 *
 * Every transition is a single conditional UPDATE ... RETURNING, so the check
 * and the write cannot be separated by another caller. Failure diagnosis reads
 * the row inside the same IMMEDIATE transaction as the failed update.
 */
export class SqliteItemRepository implements ItemStore {
  private readonly log = createComponentLogger('sqlite-store');

  private readonly insertIfAbsentStmt: Statement<[{ name: string; now: number }]>;
  private readonly findByNameStmt: Statement<[{ name: string }], SqliteItemRow>;
  private readonly findByIdStmt: Statement<[{ id: number }], SqliteItemRow>;
  private readonly reserveStmt: Statement<[ReserveBindings], SqliteItemRow>;
  private readonly terminalStmt: Statement<[TerminalBindings], SqliteItemRow>;
  private readonly releaseStmt: Statement<[TokenBindings], SqliteItemRow>;
  private readonly releaseExpiredStmt: Statement<[NowBindings], { id: number }>;
  private readonly releaseAllStmt: Statement<[NowBindings]>;
  private readonly countsStmt: Statement<[NowBindings], CountsRow>;
  private readonly listStmt: Statement<[ListBindings], SqliteItemRow>;

  constructor(private readonly db: Database) {
    this.insertIfAbsentStmt = db.prepare<[{ name: string; now: number }]>(`
      INSERT INTO items (name, state, skipped, updated_at)
      VALUES (@name, 'PENDING', 0, @now)
      ON CONFLICT (name) DO NOTHING
    `);

    this.findByNameStmt = db.prepare<[{ name: string }], SqliteItemRow>('SELECT * FROM items WHERE name = @name');
    this.findByIdStmt = db.prepare<[{ id: number }], SqliteItemRow>('SELECT * FROM items WHERE id = @id');

    this.reserveStmt = db.prepare<[ReserveBindings], SqliteItemRow>(`
      UPDATE items
      SET state = 'RESERVED',
          reservation_token = @token,
          reservation_expires_at = @expiresAt,
          updated_at = @now
      WHERE id = (
        SELECT id FROM items
        WHERE ${ELIGIBLE_PREDICATE}
        ORDER BY id
        LIMIT 1
      )
      RETURNING *
    `);

    this.terminalStmt = db.prepare<[TerminalBindings], SqliteItemRow>(`
      UPDATE items
      SET state = 'DONE',
          labels_json = @labels,
          skipped = @skipped,
          reservation_token = NULL,
          reservation_expires_at = NULL,
          updated_at = @now
      WHERE id = @id
        AND state = 'RESERVED'
        AND reservation_token = @token
        AND reservation_expires_at > @now
      RETURNING *
    `);

    this.releaseStmt = db.prepare<[TokenBindings], SqliteItemRow>(`
      UPDATE items
      SET state = 'PENDING',
          reservation_token = NULL,
          reservation_expires_at = NULL,
          updated_at = @now
      WHERE id = @id
        AND state = 'RESERVED'
        AND reservation_token = @token
        AND reservation_expires_at > @now
      RETURNING *
    `);

    this.releaseExpiredStmt = db.prepare<[NowBindings], { id: number }>(`
      UPDATE items
      SET state = 'PENDING',
          reservation_token = NULL,
          reservation_expires_at = NULL,
          updated_at = @now
      WHERE state = 'RESERVED' AND reservation_expires_at <= @now
      RETURNING id
    `);

    this.releaseAllStmt = db.prepare<[NowBindings]>(`
      UPDATE items
      SET state = 'PENDING',
          reservation_token = NULL,
          reservation_expires_at = NULL,
          updated_at = @now
      WHERE state = 'RESERVED'
    `);

    this.countsStmt = db.prepare<[NowBindings], CountsRow>(`
      SELECT
        COUNT(CASE WHEN ${ELIGIBLE_PREDICATE} THEN 1 END) AS pending,
        COUNT(CASE WHEN state = 'RESERVED' AND reservation_expires_at > @now THEN 1 END) AS reserved_live,
        COUNT(CASE WHEN state = 'DONE' THEN 1 END) AS done,
        COUNT(*) AS total
      FROM items
    `);

    this.listStmt = db.prepare<[ListBindings], SqliteItemRow>(`
      SELECT * FROM items
      WHERE (@state IS NULL OR state = @state)
      ORDER BY id
      LIMIT @limit
    `);
  }

  async upsertIfAbsent(name: string, now: Date): Promise<Item> {
    const upsert = this.db.transaction((itemName: string) => {
      const info = this.insertIfAbsentStmt.run({ name: itemName, now: now.getTime() });
      const row = this.findByNameStmt.get({ name: itemName });
      if (!row) {
        throw new Error(`Item ${itemName} missing after upsert`);
      }
      return { row, inserted: info.changes === 1 };
    });

    const { row, inserted } = upsert.immediate(name);
    if (inserted) {
      this.log.debug('Item discovered', { id: row.id, name });
    }
    return this.mapToItem(row);
  }

  async tryReserve(params: ReserveParams): Promise<Item | null> {
    const row = this.reserveStmt.get({
      token: params.token,
      expiresAt: params.expiresAt.getTime(),
      now: params.now.getTime(),
    });

    if (!row) {
      this.log.debug('No eligible item to reserve');
      return null;
    }

    return this.mapToItem(row);
  }

  async commitTerminal(params: CommitTerminalParams): Promise<TransitionResult> {
    const bindings: TerminalBindings = {
      id: params.id,
      token: params.token,
      labels: params.skipped ? null : serializeLabels(params.labels),
      skipped: params.skipped ? 1 : 0,
      now: params.now.getTime(),
    };

    return this.guardedTransition(() => this.terminalStmt.get(bindings), params);
  }

  async release(params: ReleaseParams): Promise<TransitionResult> {
    const bindings: TokenBindings = {
      id: params.id,
      token: params.token,
      now: params.now.getTime(),
    };

    return this.guardedTransition(() => this.releaseStmt.get(bindings), params);
  }

  async counts(now: Date): Promise<ItemCounts> {
    const row = this.countsStmt.get({ now: now.getTime() });
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
    const row = this.findByIdStmt.get({ id });
    return row ? this.mapToItem(row) : null;
  }

  async list(filter: ItemListFilter): Promise<Item[]> {
    const rows = this.listStmt.all({
      state: filter.state ?? null,
      // LIMIT -1 means no limit in SQLite
      limit: filter.limit !== undefined && filter.limit > 0 ? filter.limit : -1,
    });
    return rows.map((row) => this.mapToItem(row));
  }

  async releaseExpired(now: Date): Promise<ReleaseExpiredResult> {
    const rows = this.releaseExpiredStmt.all({ now: now.getTime() });
    const releasedItemIds = rows.map((row) => row.id).sort((a, b) => a - b);

    return {
      releasedCount: releasedItemIds.length,
      releasedItemIds,
    };
  }

  async releaseAll(now: Date): Promise<number> {
    return this.releaseAllStmt.run({ now: now.getTime() }).changes;
  }

  async ping(): Promise<void> {
    this.db.prepare('SELECT 1').get();
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
      this.log.info('SQLite database closed');
    }
  }

  /**
   * Run a token-gated UPDATE; when it matches nothing, explain why from the
   * row as it stands inside the same transaction
   */
  private guardedTransition(
    update: () => SqliteItemRow | undefined,
    params: { id: number; token: string; now: Date }
  ): TransitionResult {
    const attempt = this.db.transaction((): TransitionResult => {
      const updated = update();
      if (updated) {
        return { ok: true, item: this.mapToItem(updated) };
      }

      const current = this.findByIdStmt.get({ id: params.id });
      const reason = reservationFailure(
        current ? this.mapToItem(current) : null,
        params.token,
        params.now
      );

      if (!reason) {
        throw new Error(`Reservation for item ${params.id} is live but the update matched no row`);
      }
      return { ok: false, reason };
    });

    return attempt.immediate();
  }

  /**
   * Map database row to domain model
   */
  private mapToItem(row: SqliteItemRow): Item {
    const state = itemStateSchema.parse(row.state);

    return {
      id: row.id,
      name: row.name,
      state,
      skipped: row.skipped === 1,
      labels: parseStoredLabels(row.labels_json),
      reservation:
        state === ItemState.RESERVED && row.reservation_token !== null && row.reservation_expires_at !== null
          ? { token: row.reservation_token, expiresAt: new Date(row.reservation_expires_at) }
          : null,
      updatedAt: new Date(row.updated_at),
    };
  }
}
