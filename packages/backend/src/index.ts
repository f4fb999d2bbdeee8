import { create_app } from './app.js';
import { config } from './config.js';
import { logger } from './lib/logger.js';
import { close_pool } from './db/index.js';
import { run_migrations } from './db/migrate.js';
import { get_cursor_store } from './services/cursor-store.js';
import { seed_cursors } from './services/cursors.js';
import { start_staleness_cron, stop_staleness_cron } from './jobs/staleness-cron.js';

async function main(): Promise<void> {
  const store = get_cursor_store();

  if (store.kind === 'postgres') {
    await run_migrations();
  }

  if (config.seed_on_start) {
    await seed_cursors(store);
  }

  const app = create_app({ store });

  const server = app.listen(config.port, () => {
    logger.info('server started', {
      port: config.port,
      node_env: config.node_env,
      store: store.kind,
    });

    start_staleness_cron(store);
  });

  function shutdown(): void {
    logger.info('shutting down');
    stop_staleness_cron();
    server.close(() => {
      close_pool()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error('pool close failed', { error: String(err) });
          process.exit(1);
        });
    });
  }

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err: unknown) => {
  logger.error('startup failed', {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
