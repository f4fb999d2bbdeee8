import { SEEDED_SYNC_TABLES, SYNC_EPOCH } from '@syncstate/shared';
import type { SyncCursor, SyncPosition } from '@syncstate/shared';
import type { z } from 'zod';
import type { CursorStore } from './cursor-store.js';
import {
  advance_cursor_schema,
  table_name_schema,
  timestamp_schema,
  type AdvanceCursorInput,
} from '../schemas/sync.js';
import { ConstraintViolationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

export const EPOCH = new Date(SYNC_EPOCH);

function parse_or_throw<S extends z.ZodTypeAny>(schema: S, value: unknown, message: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConstraintViolationError(message, result.error.issues);
  }
  return result.data;
}

/**
 * Current cursor for a table, or null if it has never been written.
 */
export async function get_cursor(store: CursorStore, table_name: string): Promise<SyncCursor | null> {
  const name = parse_or_throw(table_name_schema, table_name, 'Invalid table name');
  return store.get(name);
}

/**
 * Treat an absent cursor as "never synced": everything since the epoch is pending.
 */
export function cursor_or_default(table_name: string, cursor: SyncCursor | null): SyncPosition {
  if (cursor) {
    return {
      table_name: cursor.table_name,
      last_synced_at: cursor.last_synced_at,
      records_synced: cursor.records_synced,
      last_chunk_id: cursor.last_chunk_id,
    };
  }
  return {
    table_name,
    last_synced_at: new Date(EPOCH.getTime()),
    records_synced: 0,
    last_chunk_id: null,
  };
}

/**
 * Record a completed sync batch. Safe to retry: the same arguments always
 * leave the same stored state. Moving a cursor backwards is allowed.
 */
export async function advance_cursor(store: CursorStore, input: AdvanceCursorInput): Promise<SyncCursor> {
  const data = parse_or_throw(advance_cursor_schema, input, 'Invalid cursor update');

  const cursor = await store.upsert({
    table_name: data.table_name,
    last_synced_at: data.last_synced_at,
    records_synced: data.records_synced,
    last_chunk_id: data.last_chunk_id ?? null,
  });

  logger.debug('cursor advanced', {
    table_name: cursor.table_name,
    last_synced_at: cursor.last_synced_at.toISOString(),
    records_synced: cursor.records_synced,
    last_chunk_id: cursor.last_chunk_id,
  });

  return cursor;
}

/**
 * Rewind a cursor so the next sync re-processes everything after `to`.
 */
export async function reset_cursor(
  store: CursorStore,
  table_name: string,
  to: Date | string = EPOCH
): Promise<SyncCursor> {
  const name = parse_or_throw(table_name_schema, table_name, 'Invalid table name');
  const watermark = parse_or_throw(timestamp_schema, to, 'Invalid reset timestamp');

  const cursor = await store.upsert({
    table_name: name,
    last_synced_at: watermark,
    records_synced: 0,
    last_chunk_id: null,
  });

  logger.info('cursor reset', { table_name: name, to: watermark.toISOString() });
  return cursor;
}

export async function reset_all_cursors(store: CursorStore, to: Date | string = EPOCH): Promise<SyncCursor[]> {
  const existing = await store.list();
  const reset: SyncCursor[] = [];
  for (const cursor of existing) {
    reset.push(await reset_cursor(store, cursor.table_name, to));
  }
  return reset;
}

export async function seed_cursors(
  store: CursorStore,
  table_names: readonly string[] = SEEDED_SYNC_TABLES
): Promise<number> {
  for (const name of table_names) {
    parse_or_throw(table_name_schema, name, 'Invalid table name');
  }

  const created = await store.seed(table_names, EPOCH);
  logger.info('sync cursors seeded', { requested: table_names.length, created });
  return created;
}
