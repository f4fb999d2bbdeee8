import { readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { Asset, AssetTypeSummary } from '@syncstate/shared';
import { query } from '../db/index.js';
import { asset_universe_schema } from '../schemas/assets.js';
import { ConstraintViolationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
export const ASSET_UNIVERSE_PATH = join(__dirname, '..', '..', 'data', 'high-impact-assets.json');

export function parse_asset_universe(raw: unknown): Asset[] {
  const result = asset_universe_schema.safeParse(raw);
  if (!result.success) {
    throw new ConstraintViolationError('Invalid asset universe', result.error.issues);
  }
  return result.data.assets;
}

export async function load_asset_universe(path: string = ASSET_UNIVERSE_PATH): Promise<Asset[]> {
  const contents = await readFile(path, 'utf-8');
  return parse_asset_universe(JSON.parse(contents));
}

/**
 * Insert or refresh the given tickers. Returns the number of rows written.
 */
export async function upsert_assets(assets: Asset[]): Promise<number> {
  if (assets.length === 0) {
    return 0;
  }

  const result = await query(
    `INSERT INTO assets (ticker, name, asset_type, exchange, priority_score)
     SELECT * FROM unnest($1::varchar[], $2::text[], $3::varchar[], $4::varchar[], $5::int[])
     ON CONFLICT (ticker) DO UPDATE SET
       name = EXCLUDED.name,
       asset_type = EXCLUDED.asset_type,
       exchange = EXCLUDED.exchange,
       priority_score = EXCLUDED.priority_score,
       updated_at = NOW()`,
    [
      assets.map((a) => a.ticker),
      assets.map((a) => a.name),
      assets.map((a) => a.asset_type),
      assets.map((a) => a.exchange),
      assets.map((a) => a.priority_score),
    ]
  );

  return result.rowCount ?? 0;
}

interface AssetTypeSummaryRow {
  asset_type: Asset['asset_type'];
  count: number;
  avg_priority: string | number; // NUMERIC arrives as text
}

export async function summarize_assets(tickers: string[]): Promise<AssetTypeSummary[]> {
  const result = await query<AssetTypeSummaryRow>(
    `SELECT asset_type, COUNT(*)::int AS count, ROUND(AVG(priority_score), 1) AS avg_priority
     FROM assets
     WHERE ticker = ANY($1::varchar[])
     GROUP BY asset_type
     ORDER BY avg_priority DESC`,
    [tickers]
  );

  return result.rows.map((row) => ({
    asset_type: row.asset_type,
    count: row.count,
    avg_priority: Number(row.avg_priority),
  }));
}

export async function seed_asset_universe(path?: string): Promise<AssetTypeSummary[]> {
  const assets = await load_asset_universe(path);
  const written = await upsert_assets(assets);
  const summary = await summarize_assets(assets.map((a) => a.ticker));

  logger.info('asset universe seeded', { assets: assets.length, written, summary });
  return summary;
}
