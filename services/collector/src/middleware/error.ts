import type { ErrorRequestHandler } from 'express';
import { CollectorError } from '../errors.js';
import { logger } from '../logger.js';

function httpStatusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') return err.status;
  return 500;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const status = httpStatusOf(err);
  const code = err instanceof CollectorError ? err.code : status < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR';
  const message = err instanceof Error ? err.message : 'internal error';
  logger.error({ err, rid: res.locals.rid }, 'request error');
  res.status(status).json({ error: { code, message } });
};
