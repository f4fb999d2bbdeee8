import { close_pool } from './index.js';
import { create_pg_cursor_store } from '../services/cursor-store.js';
import { seed_cursors } from '../services/cursors.js';
import { seed_asset_universe } from '../services/assets.js';
import { logger } from '../lib/logger.js';

async function main(): Promise<void> {
  try {
    await seed_cursors(create_pg_cursor_store());
    await seed_asset_universe();
  } catch (error) {
    logger.error('Seed failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exitCode = 1;
  } finally {
    await close_pool();
  }
}

main().catch((error: unknown) => {
  logger.error('Seed failed', { error: String(error) });
  process.exit(1);
});
