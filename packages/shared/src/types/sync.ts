export type SyncStatus = 'CURRENT' | 'RECENT' | 'STALE' | 'VERY_STALE';

export interface SyncCursor {
  table_name: string;
  last_synced_at: Date;
  records_synced: number;
  last_chunk_id: string | null;
  created_at: Date;
  updated_at: Date;
}

// Watermark fields a sync job needs to resume; also the shape of the epoch default
export type SyncPosition = Pick<
  SyncCursor,
  'table_name' | 'last_synced_at' | 'records_synced' | 'last_chunk_id'
>;

export interface SyncProgress {
  table_name: string;
  last_synced_at: Date;
  records_synced: number;
  hours_since_sync: number;
  status: SyncStatus;
  updated_at: Date;
}

export type SyncProgressSummary = Record<SyncStatus, number> & {
  total: number;
};
