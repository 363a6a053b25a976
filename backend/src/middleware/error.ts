import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { createLogger } from '../logger.js';
import { StoreError, type StoreErrorCode } from '../services/store.js';

const log = createLogger('http');

const STORE_STATUS: Record<StoreErrorCode, number> = {
  SESSION_NOT_FOUND: 404,
  SESSION_CLOSED: 409,
  SESSION_ALREADY_OPEN: 409,
  OUT_OF_ORDER: 409,
};

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction
) {
  if (res.headersSent) return next(err);
  if (err instanceof ZodError) {
    return res.status(400).json({ error: 'ValidationError', issues: err.flatten() });
  }
  if (err instanceof StoreError) {
    return res.status(STORE_STATUS[err.code]).json({ error: err.code, message: err.message });
  }
  log.error('unhandled request error', err);
  return res.status(500).json({ error: 'InternalServerError' });
}
