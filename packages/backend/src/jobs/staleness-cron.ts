import cron, { type ScheduledTask } from 'node-cron';
import type { SyncProgressSummary } from '@syncstate/shared';
import { config } from '../config.js';
import { logger } from '../lib/logger.js';
import type { CursorStore } from '../services/cursor-store.js';
import { is_behind, list_progress, summarize_progress } from '../services/progress.js';

// ── Types ──────────────────────────────────────────────────────────────────

export interface StalenessCheckResult {
  skipped?: boolean;
  summary: SyncProgressSummary | null;
  behind: string[];
  duration_ms: number;
}

// ── Mutex ──────────────────────────────────────────────────────────────────

let is_running = false;

export function is_check_running(): boolean {
  return is_running;
}

// ── Check ──────────────────────────────────────────────────────────────────

export async function run_staleness_check(store: CursorStore): Promise<StalenessCheckResult> {
  if (is_running) {
    logger.info('staleness check already running, skipping');
    return { skipped: true, summary: null, behind: [], duration_ms: 0 };
  }

  is_running = true;
  const start = Date.now();

  try {
    const progress = await list_progress(store);
    const summary = summarize_progress(progress);
    const behind: string[] = [];

    for (const row of progress) {
      if (!is_behind(row.status)) continue;
      behind.push(row.table_name);
      logger.warn('sync cursor behind', {
        table_name: row.table_name,
        status: row.status,
        hours_since_sync: Math.round(row.hours_since_sync * 10) / 10,
        last_synced_at: row.last_synced_at.toISOString(),
      });
    }

    logger.info('staleness check completed', { ...summary, behind: behind.length });
    return { summary, behind, duration_ms: Date.now() - start };
  } finally {
    is_running = false;
  }
}

// ── Cron scheduling ────────────────────────────────────────────────────────

let cron_task: ScheduledTask | null = null;

export function start_staleness_cron(store: CursorStore): void {
  if (cron_task) {
    logger.warn('staleness cron already started');
    return;
  }

  const interval = config.staleness_cron_interval;

  if (!cron.validate(interval)) {
    logger.error('Invalid staleness cron interval', { interval });
    return;
  }

  cron_task = cron.schedule(interval, () => {
    run_staleness_check(store).catch((error: unknown) => {
      logger.error('staleness check failed', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    });
  });

  logger.info('staleness cron started', { interval });
}

export function stop_staleness_cron(): void {
  if (cron_task) {
    cron_task.stop();
    cron_task = null;
    logger.info('staleness cron stopped');
  }
}
