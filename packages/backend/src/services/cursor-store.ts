import type { SyncCursor } from '@syncstate/shared';
import { query } from '../db/index.js';
import { config } from '../config.js';

export interface CursorWrite {
  table_name: string;
  last_synced_at: Date;
  records_synced: number;
  last_chunk_id?: string | null;
}

/**
 * Durable cursor persistence keyed by source table name.
 *
 * `upsert` creates or replaces every mutable field in one atomic step;
 * `created_at` survives updates and `updated_at` is stamped on each write.
 */
export interface CursorStore {
  readonly kind: 'postgres' | 'memory';
  get(table_name: string): Promise<SyncCursor | null>;
  upsert(write: CursorWrite): Promise<SyncCursor>;
  /** Freshest first, ties by table name. */
  list(): Promise<SyncCursor[]>;
  /** Inserts missing names at the given watermark; existing rows are left alone. */
  seed(table_names: readonly string[], watermark: Date): Promise<number>;
  /** Clock used to judge staleness. */
  now(): Promise<Date>;
}

// ── PostgreSQL ─────────────────────────────────────────────────────────────

interface SyncCursorRow {
  table_name: string;
  last_synced_at: Date;
  records_synced: string | number; // BIGINT arrives as text
  last_chunk_id: string | null;
  created_at: Date;
  updated_at: Date;
}

const CURSOR_COLUMNS =
  'table_name, last_synced_at, records_synced, last_chunk_id, created_at, updated_at';

export function map_cursor_row(row: SyncCursorRow): SyncCursor {
  return {
    table_name: row.table_name,
    last_synced_at: row.last_synced_at,
    records_synced: Number(row.records_synced),
    last_chunk_id: row.last_chunk_id,
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

export function create_pg_cursor_store(): CursorStore {
  return {
    kind: 'postgres',

    async get(table_name) {
      const result = await query<SyncCursorRow>(
        `SELECT ${CURSOR_COLUMNS} FROM vector_sync_state WHERE table_name = $1`,
        [table_name]
      );
      const row = result.rows[0];
      return row ? map_cursor_row(row) : null;
    },

    async upsert(write) {
      const result = await query<SyncCursorRow>(
        `INSERT INTO vector_sync_state (table_name, last_synced_at, records_synced, last_chunk_id, created_at, updated_at)
         VALUES ($1, $2, $3, $4, NOW(), NOW())
         ON CONFLICT (table_name) DO UPDATE SET
           last_synced_at = EXCLUDED.last_synced_at,
           records_synced = EXCLUDED.records_synced,
           last_chunk_id = EXCLUDED.last_chunk_id,
           updated_at = NOW()
         RETURNING ${CURSOR_COLUMNS}`,
        [write.table_name, write.last_synced_at, write.records_synced, write.last_chunk_id ?? null]
      );
      const row = result.rows[0];
      if (!row) {
        throw new Error(`Upsert returned no row for ${write.table_name}`);
      }
      return map_cursor_row(row);
    },

    async list() {
      const result = await query<SyncCursorRow>(
        `SELECT ${CURSOR_COLUMNS} FROM vector_sync_state
         ORDER BY last_synced_at DESC, table_name COLLATE "C" ASC`
      );
      return result.rows.map(map_cursor_row);
    },

    async seed(table_names, watermark) {
      if (table_names.length === 0) {
        return 0;
      }
      const result = await query(
        `INSERT INTO vector_sync_state (table_name, last_synced_at, records_synced)
         SELECT name, $2, 0 FROM unnest($1::varchar[]) AS name
         ON CONFLICT (table_name) DO NOTHING`,
        [[...table_names], watermark]
      );
      return result.rowCount ?? 0;
    },

    async now() {
      const result = await query<{ now: Date }>('SELECT NOW() AS now');
      const row = result.rows[0];
      return row ? row.now : new Date();
    },
  };
}

// ── In-process ─────────────────────────────────────────────────────────────

function copy_cursor(cursor: SyncCursor): SyncCursor {
  return {
    ...cursor,
    last_synced_at: new Date(cursor.last_synced_at.getTime()),
    created_at: new Date(cursor.created_at.getTime()),
    updated_at: new Date(cursor.updated_at.getTime()),
  };
}

export function compare_cursors(a: SyncCursor, b: SyncCursor): number {
  const diff = b.last_synced_at.getTime() - a.last_synced_at.getTime();
  if (diff !== 0) {
    return diff;
  }
  return a.table_name < b.table_name ? -1 : a.table_name > b.table_name ? 1 : 0;
}

export interface MemoryCursorStoreOptions {
  clock?: () => Date;
}

/**
 * Single-process store backed by a Map. Each upsert reads and replaces the
 * entry synchronously, so concurrent callers can never interleave.
 */
export function create_memory_cursor_store(options: MemoryCursorStoreOptions = {}): CursorStore {
  const clock = options.clock ?? (() => new Date());
  const cursors = new Map<string, SyncCursor>();

  return {
    kind: 'memory',

    async get(table_name) {
      const cursor = cursors.get(table_name);
      return cursor ? copy_cursor(cursor) : null;
    },

    async upsert(write) {
      const now = clock();
      const existing = cursors.get(write.table_name);
      const cursor: SyncCursor = {
        table_name: write.table_name,
        last_synced_at: new Date(write.last_synced_at.getTime()),
        records_synced: write.records_synced,
        last_chunk_id: write.last_chunk_id ?? null,
        created_at: existing ? existing.created_at : now,
        updated_at: now,
      };
      cursors.set(write.table_name, cursor);
      return copy_cursor(cursor);
    },

    async list() {
      return [...cursors.values()].map(copy_cursor).sort(compare_cursors);
    },

    async seed(table_names, watermark) {
      let created = 0;
      for (const table_name of new Set(table_names)) {
        if (cursors.has(table_name)) {
          continue;
        }
        const now = clock();
        cursors.set(table_name, {
          table_name,
          last_synced_at: new Date(watermark.getTime()),
          records_synced: 0,
          last_chunk_id: null,
          created_at: now,
          updated_at: now,
        });
        created++;
      }
      return created;
    },

    async now() {
      return clock();
    },
  };
}

// ── Default store ──────────────────────────────────────────────────────────

let default_store: CursorStore | null = null;

export function get_cursor_store(): CursorStore {
  if (!default_store) {
    default_store =
      config.store_type === 'memory' ? create_memory_cursor_store() : create_pg_cursor_store();
  }
  return default_store;
}
