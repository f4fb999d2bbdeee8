import { SYNC_STATUSES } from '@syncstate/shared';
import type { SyncCursor, SyncProgress, SyncProgressSummary, SyncStatus } from '@syncstate/shared';
import type { CursorStore } from './cursor-store.js';
import { compare_cursors } from './cursor-store.js';
import { hours_between } from '../lib/time.js';

const HOUR_MS = 60 * 60 * 1000;

// Upper bounds (exclusive) of each status band
export const STALENESS_THRESHOLDS_MS = {
  CURRENT: HOUR_MS,
  RECENT: 24 * HOUR_MS,
  STALE: 7 * 24 * HOUR_MS,
} as const;

export function classify_staleness(age_ms: number): SyncStatus {
  if (age_ms < STALENESS_THRESHOLDS_MS.CURRENT) return 'CURRENT';
  if (age_ms < STALENESS_THRESHOLDS_MS.RECENT) return 'RECENT';
  if (age_ms < STALENESS_THRESHOLDS_MS.STALE) return 'STALE';
  return 'VERY_STALE';
}

export function to_progress(cursor: SyncCursor, now: Date): SyncProgress {
  const age_ms = now.getTime() - cursor.last_synced_at.getTime();
  return {
    table_name: cursor.table_name,
    last_synced_at: cursor.last_synced_at,
    records_synced: cursor.records_synced,
    hours_since_sync: hours_between(cursor.last_synced_at, now),
    status: classify_staleness(age_ms),
    updated_at: cursor.updated_at,
  };
}

export function build_progress(cursors: SyncCursor[], now: Date): SyncProgress[] {
  return [...cursors].sort(compare_cursors).map((cursor) => to_progress(cursor, now));
}

/**
 * Staleness of every stored cursor, freshest first, judged on the store's clock.
 */
export async function list_progress(store: CursorStore): Promise<SyncProgress[]> {
  const [cursors, now] = await Promise.all([store.list(), store.now()]);
  return build_progress(cursors, now);
}

export function summarize_progress(rows: SyncProgress[]): SyncProgressSummary {
  const summary: SyncProgressSummary = {
    total: rows.length,
    CURRENT: 0,
    RECENT: 0,
    STALE: 0,
    VERY_STALE: 0,
  };
  for (const row of rows) {
    summary[row.status]++;
  }
  return summary;
}

export function is_behind(status: SyncStatus): boolean {
  return SYNC_STATUSES.indexOf(status) >= SYNC_STATUSES.indexOf('STALE');
}
