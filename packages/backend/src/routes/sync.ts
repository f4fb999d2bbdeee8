import { Router } from 'express';
import { require_api_key } from '../middleware/auth.js';
import type { CursorStore } from '../services/cursor-store.js';
import { advance_cursor, get_cursor, reset_cursor } from '../services/cursors.js';
import { list_progress, summarize_progress } from '../services/progress.js';
import {
  advance_cursor_body_schema,
  reset_cursor_body_schema,
  table_name_param_schema,
} from '../schemas/sync.js';

export function create_sync_router(store: CursorStore): Router {
  const router = Router();

  router.use('/sync', require_api_key);

  // Staleness report for every cursor, freshest first
  router.get('/sync/cursors', async (_req, res, next) => {
    try {
      const progress = await list_progress(store);
      res.json({ progress, summary: summarize_progress(progress) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/sync/cursors/:table_name', async (req, res, next) => {
    try {
      const param_result = table_name_param_schema.safeParse(req.params);
      if (!param_result.success) {
        res.status(400).json({ error: 'Invalid table name', details: param_result.error.issues });
        return;
      }

      const cursor = await get_cursor(store, param_result.data.table_name);
      if (!cursor) {
        res.status(404).json({ error: 'Cursor not found' });
        return;
      }

      res.json({ cursor });
    } catch (err) {
      next(err);
    }
  });

  // Advance (or create) a cursor after a completed sync batch
  router.put('/sync/cursors/:table_name', async (req, res, next) => {
    try {
      const param_result = table_name_param_schema.safeParse(req.params);
      if (!param_result.success) {
        res.status(400).json({ error: 'Invalid table name', details: param_result.error.issues });
        return;
      }

      const body_result = advance_cursor_body_schema.safeParse(req.body);
      if (!body_result.success) {
        res.status(400).json({ error: 'Invalid request body', details: body_result.error.issues });
        return;
      }

      const cursor = await advance_cursor(store, {
        table_name: param_result.data.table_name,
        ...body_result.data,
      });
      res.json({ cursor });
    } catch (err) {
      next(err);
    }
  });

  router.post('/sync/cursors/:table_name/reset', async (req, res, next) => {
    try {
      const param_result = table_name_param_schema.safeParse(req.params);
      if (!param_result.success) {
        res.status(400).json({ error: 'Invalid table name', details: param_result.error.issues });
        return;
      }

      const body_result = reset_cursor_body_schema.safeParse(req.body);
      if (!body_result.success) {
        res.status(400).json({ error: 'Invalid request body', details: body_result.error.issues });
        return;
      }

      const cursor = await reset_cursor(store, param_result.data.table_name, body_result.data.to);
      res.json({ cursor });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
