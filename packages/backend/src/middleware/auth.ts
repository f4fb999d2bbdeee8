import { timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import { config } from '../config.js';
import { logger } from '../lib/logger.js';

function keys_match(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

// Sync workers and operators authenticate with the shared service key
export function require_api_key(req: Request, res: Response, next: NextFunction): void {
  const api_key = req.headers['x-api-key'];

  if (typeof api_key !== 'string' || api_key === '') {
    logger.warn('auth: missing API key', { request_id: req.request_id, path: req.path });
    res.status(401).json({ error: 'API key required' });
    return;
  }

  if (!keys_match(api_key, config.api_key)) {
    logger.warn('auth: invalid API key', { request_id: req.request_id, path: req.path });
    res.status(401).json({ error: 'Invalid API key' });
    return;
  }

  next();
}
