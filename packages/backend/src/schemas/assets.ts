import { z } from 'zod';

export const asset_type_schema = z.enum(['stock', 'etf', 'crypto']);

export const asset_schema = z.object({
  ticker: z.string().min(1).max(20),
  name: z.string().min(1),
  asset_type: asset_type_schema,
  exchange: z.string().min(1),
  priority_score: z.number().int().min(0).max(100),
});

// One statement upserts the whole universe, so a ticker may appear only once
export const asset_universe_schema = z.object({
  assets: z
    .array(asset_schema)
    .min(1)
    .refine(
      (assets) => new Set(assets.map((a) => a.ticker)).size === assets.length,
      'Duplicate ticker in asset universe'
    ),
});

export type AssetInput = z.infer<typeof asset_schema>;
export type AssetUniverse = z.infer<typeof asset_universe_schema>;
