import { SYNC_STATUSES, SYNC_STATUS_LABELS } from '@syncstate/shared';
import type { SyncProgress, SyncProgressSummary } from '@syncstate/shared';
import { close_pool } from './db/index.js';
import { logger } from './lib/logger.js';
import { get_cursor_store, type CursorStore } from './services/cursor-store.js';
import { reset_all_cursors, reset_cursor } from './services/cursors.js';
import { list_progress, summarize_progress } from './services/progress.js';

const USAGE = `Usage: syncstate <command>

Commands:
  status               Show sync progress for every cursor
  reset [table_name]   Rewind one cursor (or all) to the epoch watermark`;

type Write = (line: string) => void;

function pad(value: string, width: number): string {
  return value.length >= width ? value : value + ' '.repeat(width - value.length);
}

export function format_progress_table(rows: SyncProgress[]): string[] {
  const header = ['TABLE', 'LAST SYNCED', 'RECORDS', 'HOURS', 'STATUS'];
  const body = rows.map((row) => [
    row.table_name,
    row.last_synced_at.toISOString(),
    String(row.records_synced),
    row.hours_since_sync.toFixed(1),
    SYNC_STATUS_LABELS[row.status],
  ]);

  const widths = header.map((title, i) =>
    Math.max(title.length, ...body.map((cells) => cells[i]?.length ?? 0))
  );

  return [header, ...body].map((cells) =>
    cells
      .map((cell, i) => pad(cell, widths[i] ?? 0))
      .join('  ')
      .trimEnd()
  );
}

export function format_summary(summary: SyncProgressSummary): string {
  const parts = SYNC_STATUSES.map((status) => `${SYNC_STATUS_LABELS[status]}: ${summary[status]}`);
  return `${summary.total} cursors (${parts.join(', ')})`;
}

/**
 * Returns the process exit code.
 */
export async function run_cli(args: string[], store: CursorStore, write: Write = console.log): Promise<number> {
  const [command, table_name] = args;

  switch (command) {
    case 'status': {
      const progress = await list_progress(store);
      for (const line of format_progress_table(progress)) {
        write(line);
      }
      write('');
      write(format_summary(summarize_progress(progress)));
      return 0;
    }
    case 'reset': {
      if (table_name) {
        const cursor = await reset_cursor(store, table_name);
        write(`Reset ${cursor.table_name} to ${cursor.last_synced_at.toISOString()}`);
      } else {
        const cursors = await reset_all_cursors(store);
        write(`Reset ${cursors.length} cursors`);
      }
      return 0;
    }
    default:
      for (const line of USAGE.split('\n')) {
        write(line);
      }
      return 1;
  }
}

const is_main = process.argv[1]?.endsWith('cli.ts') || process.argv[1]?.endsWith('cli.js');
if (is_main) {
  run_cli(process.argv.slice(2), get_cursor_store())
    .then(async (code) => {
      await close_pool();
      process.exit(code);
    })
    .catch((err: unknown) => {
      logger.error('command failed', {
        error: err instanceof Error ? err.message : String(err),
      });
      process.exit(1);
    });
}
