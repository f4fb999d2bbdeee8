import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('./lib/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import type { SyncProgress } from '@syncstate/shared';
import { format_progress_table, format_summary, run_cli } from './cli.js';
import { create_memory_cursor_store, type CursorStore } from './services/cursor-store.js';

const NOW = new Date('2024-06-15T12:00:00Z');

let store: CursorStore;
let lines: string[];
const write = (line: string) => {
  lines.push(line);
};

beforeEach(() => {
  store = create_memory_cursor_store({ clock: () => NOW });
  lines = [];
});

describe('format_progress_table', () => {
  it('aligns columns to the widest cell', () => {
    const rows: SyncProgress[] = [
      {
        table_name: 'anomalies',
        last_synced_at: new Date('2024-06-15T09:00:00Z'),
        records_synced: 12,
        hours_since_sync: 3,
        status: 'RECENT',
        updated_at: NOW,
      },
    ];

    expect(format_progress_table(rows)).toEqual([
      'TABLE      LAST SYNCED               RECORDS  HOURS  STATUS',
      'anomalies  2024-06-15T09:00:00.000Z  12       3.0    Recent',
    ]);
  });
});

describe('format_summary', () => {
  it('lists every status', () => {
    expect(format_summary({ total: 3, CURRENT: 1, RECENT: 0, STALE: 1, VERY_STALE: 1 })).toBe(
      '3 cursors (Current: 1, Recent: 0, Stale: 1, Very stale: 1)'
    );
  });
});

describe('run_cli', () => {
  it('prints status for every cursor', async () => {
    await store.upsert({ table_name: 'market_prices', last_synced_at: NOW, records_synced: 7 });

    const code = await run_cli(['status'], store, write);

    expect(code).toBe(0);
    expect(lines).toEqual([
      'TABLE          LAST SYNCED               RECORDS  HOURS  STATUS',
      'market_prices  2024-06-15T12:00:00.000Z  7        0.0    Current',
      '',
      '1 cursors (Current: 1, Recent: 0, Stale: 0, Very stale: 0)',
    ]);
  });

  it('resets a single cursor', async () => {
    await store.upsert({ table_name: 'anomalies', last_synced_at: NOW, records_synced: 7 });

    const code = await run_cli(['reset', 'anomalies'], store, write);

    expect(code).toBe(0);
    expect(lines).toEqual(['Reset anomalies to 2020-01-01T00:00:00.000Z']);
    expect((await store.get('anomalies'))?.records_synced).toBe(0);
  });

  it('resets every cursor when no table is named', async () => {
    await store.seed(['a', 'b', 'c'], NOW);

    const code = await run_cli(['reset'], store, write);

    expect(code).toBe(0);
    expect(lines).toEqual(['Reset 3 cursors']);
  });

  it('prints usage for an unknown command', async () => {
    const code = await run_cli(['sync'], store, write);

    expect(code).toBe(1);
    expect(lines[0]).toBe('Usage: syncstate <command>');
    expect(lines).toHaveLength(5);
    expect(lines[2]).toBe('Commands:');
  });
});
