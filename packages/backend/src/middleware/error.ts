import type { Request, Response, NextFunction } from 'express';
import type { ZodIssue } from 'zod';
import { logger } from '../lib/logger.js';

export interface ApiError extends Error {
  status_code?: number;
  status?: number; // body-parser uses 'status'
  code?: string;
  details?: ZodIssue[];
}

export function error_middleware(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status_code = err.status_code || err.status || 500;
  const message = status_code >= 500 && !err.code ? 'Internal server error' : err.message;

  const log_context: Record<string, unknown> = {
    request_id: req.request_id,
    method: req.method,
    path: req.originalUrl || req.path,
    error: err.message,
    error_type: err.name,
    status_code,
  };

  if (err.code) {
    log_context.code = err.code;
  }

  // Only include stack for server-side failures
  if (status_code >= 500) {
    log_context.stack = err.stack;
  }

  if (status_code >= 500) {
    logger.error('request error', log_context);
  } else {
    logger.warn('request error', log_context);
  }

  res.status(status_code).json({
    error: message,
    request_id: req.request_id,
    ...(err.code ? { code: err.code } : {}),
    ...(err.details ? { details: err.details } : {}),
  });
}
