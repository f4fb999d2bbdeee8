import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { logger } from '../lib/logger.js';

declare global {
  namespace Express {
    interface Request {
      request_id: string;
    }
  }
}

export function logging_middleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers['x-request-id'];
  const request_id = typeof incoming === 'string' && incoming !== '' ? incoming : randomUUID();
  req.request_id = request_id;
  res.setHeader('x-request-id', request_id);

  const start = Date.now();

  res.on('finish', () => {
    const duration_ms = Date.now() - start;
    const meta = {
      request_id,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms,
    };
    if (req.path === '/api/health') {
      logger.debug('request completed', meta);
    } else {
      logger.info('request completed', meta);
    }
  });

  next();
}
