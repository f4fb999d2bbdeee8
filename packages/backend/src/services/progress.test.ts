import { describe, it, expect } from 'vitest';
import type { SyncCursor } from '@syncstate/shared';
import {
  build_progress,
  classify_staleness,
  is_behind,
  list_progress,
  summarize_progress,
  to_progress,
} from './progress.js';
import { create_memory_cursor_store } from './cursor-store.js';

const HOUR = 60 * 60 * 1000;
const NOW = new Date('2024-06-15T12:00:00Z');

function make_cursor(table_name: string, last_synced_at: string, overrides: Partial<SyncCursor> = {}): SyncCursor {
  return {
    table_name,
    last_synced_at: new Date(last_synced_at),
    records_synced: 0,
    last_chunk_id: null,
    created_at: new Date('2024-01-01T00:00:00Z'),
    updated_at: new Date('2024-06-01T00:00:00Z'),
    ...overrides,
  };
}

describe('classify_staleness', () => {
  it.each([
    [0, 'CURRENT'],
    [HOUR - 1, 'CURRENT'],
    [HOUR, 'RECENT'],
    [24 * HOUR - 1, 'RECENT'],
    [24 * HOUR, 'STALE'],
    [7 * 24 * HOUR - 1, 'STALE'],
    [7 * 24 * HOUR, 'VERY_STALE'],
    [400 * 24 * HOUR, 'VERY_STALE'],
  ] as const)('classifies an age of %d ms as %s', (age_ms, expected) => {
    expect(classify_staleness(age_ms)).toBe(expected);
  });

  it('treats a watermark in the future as current', () => {
    expect(classify_staleness(-5 * HOUR)).toBe('CURRENT');
  });
});

describe('to_progress', () => {
  it('keeps fractional hours since the last sync', () => {
    const row = to_progress(
      make_cursor('news_headlines', '2024-06-15T09:30:00Z', { records_synced: 120 }),
      NOW
    );

    expect(row).toEqual({
      table_name: 'news_headlines',
      last_synced_at: new Date('2024-06-15T09:30:00Z'),
      records_synced: 120,
      hours_since_sync: 2.5,
      status: 'RECENT',
      updated_at: new Date('2024-06-01T00:00:00Z'),
    });
  });
});

describe('build_progress', () => {
  it('orders rows freshest first', () => {
    const rows = build_progress(
      [
        make_cursor('anomalies', '2024-06-01T00:00:00Z'),
        make_cursor('market_prices', '2024-06-15T11:45:00Z'),
        make_cursor('news_sentiment', '2024-06-14T00:00:00Z'),
      ],
      NOW
    );

    expect(rows.map((r) => r.table_name)).toEqual(['market_prices', 'news_sentiment', 'anomalies']);
    expect(rows.map((r) => r.status)).toEqual(['CURRENT', 'STALE', 'VERY_STALE']);
  });

  it('breaks ties on table name', () => {
    const rows = build_progress(
      [
        make_cursor('news_sentiment', '2020-01-01T00:00:00Z'),
        make_cursor('alpha_vantage_data', '2020-01-01T00:00:00Z'),
      ],
      NOW
    );

    expect(rows.map((r) => r.table_name)).toEqual(['alpha_vantage_data', 'news_sentiment']);
  });

  it('does not reorder the caller array', () => {
    const cursors = [
      make_cursor('b', '2024-06-01T00:00:00Z'),
      make_cursor('a', '2024-06-15T00:00:00Z'),
    ];
    build_progress(cursors, NOW);
    expect(cursors.map((c) => c.table_name)).toEqual(['b', 'a']);
  });
});

describe('summarize_progress', () => {
  it('counts rows per status', () => {
    const rows = build_progress(
      [
        make_cursor('a', '2024-06-15T11:59:00Z'),
        make_cursor('b', '2024-06-15T11:30:00Z'),
        make_cursor('c', '2024-06-15T06:00:00Z'),
        make_cursor('d', '2020-01-01T00:00:00Z'),
      ],
      NOW
    );

    expect(summarize_progress(rows)).toEqual({
      total: 4,
      CURRENT: 2,
      RECENT: 1,
      STALE: 0,
      VERY_STALE: 1,
    });
  });

  it('returns zeroes for no cursors', () => {
    expect(summarize_progress([])).toEqual({
      total: 0,
      CURRENT: 0,
      RECENT: 0,
      STALE: 0,
      VERY_STALE: 0,
    });
  });
});

describe('is_behind', () => {
  it('flags stale and very stale cursors only', () => {
    expect(is_behind('CURRENT')).toBe(false);
    expect(is_behind('RECENT')).toBe(false);
    expect(is_behind('STALE')).toBe(true);
    expect(is_behind('VERY_STALE')).toBe(true);
  });
});

describe('list_progress', () => {
  it('judges staleness on the store clock', async () => {
    const store = create_memory_cursor_store({ clock: () => NOW });
    await store.upsert({
      table_name: 'alpha_vantage_data',
      last_synced_at: new Date('2024-06-15T11:00:00Z'),
      records_synced: 10,
    });
    await store.upsert({
      table_name: 'market_prices',
      last_synced_at: new Date('2024-06-15T11:00:00.001Z'),
      records_synced: 20,
    });

    const rows = await list_progress(store);

    expect(rows.map((r) => [r.table_name, r.status])).toEqual([
      ['market_prices', 'CURRENT'],
      ['alpha_vantage_data', 'RECENT'],
    ]);
    expect(rows[1]?.hours_since_sync).toBe(1);
  });
});
