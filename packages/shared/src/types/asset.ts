export type AssetType = 'stock' | 'etf' | 'crypto';

export interface Asset {
  ticker: string;
  name: string;
  asset_type: AssetType;
  exchange: string;
  priority_score: number;
}

export interface AssetTypeSummary {
  asset_type: AssetType;
  count: number;
  avg_priority: number;
}
