import express from 'express';
import { logging_middleware } from './middleware/logging.js';
import { error_middleware } from './middleware/error.js';
import { create_health_router } from './routes/health.js';
import { create_sync_router } from './routes/sync.js';
import { get_cursor_store, type CursorStore } from './services/cursor-store.js';

export interface AppOptions {
  store?: CursorStore;
}

export function create_app(options: AppOptions = {}): express.Application {
  const store = options.store ?? get_cursor_store();
  const app = express();

  app.use(express.json());
  app.use(logging_middleware);

  // Public routes
  app.use('/api', create_health_router(store));

  // Cursor routes for sync workers
  app.use('/api', create_sync_router(store));

  app.use(error_middleware);

  return app;
}
