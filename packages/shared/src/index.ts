export type {
  SyncStatus,
  SyncCursor,
  SyncPosition,
  SyncProgress,
  SyncProgressSummary,
} from './types/sync.js';
export type { Asset, AssetType, AssetTypeSummary } from './types/asset.js';
export {
  SYNC_EPOCH,
  SEEDED_SYNC_TABLES,
  TABLE_NAME_MAX_LENGTH,
  CHUNK_ID_MAX_LENGTH,
  SYNC_STATUSES,
  SYNC_STATUS_LABELS,
} from './constants/sync.js';
