import { Router } from 'express';
import type { CursorStore } from '../services/cursor-store.js';

export function create_health_router(store: CursorStore): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    try {
      await store.now();
      res.json({ status: 'ok', store: store.kind, database: 'connected' });
    } catch {
      res.status(503).json({ status: 'error', store: store.kind, database: 'disconnected' });
    }
  });

  return router;
}
