import type { SyncStatus } from '../types/sync.js';

/** Watermark given to cursors that have never synced. */
export const SYNC_EPOCH = '2020-01-01T00:00:00Z';

export const SEEDED_SYNC_TABLES = [
  'alpha_vantage_data',
  'news_headlines',
  'news_sentiment',
  'anomalies',
  'market_prices',
] as const;

export const TABLE_NAME_MAX_LENGTH = 100;
export const CHUNK_ID_MAX_LENGTH = 255;

export const SYNC_STATUSES: SyncStatus[] = ['CURRENT', 'RECENT', 'STALE', 'VERY_STALE'];

export const SYNC_STATUS_LABELS: Record<SyncStatus, string> = {
  CURRENT: 'Current',
  RECENT: 'Recent',
  STALE: 'Stale',
  VERY_STALE: 'Very stale',
};
