import type { ErrorRequestHandler } from 'express';
import { logger } from '../logger.js';
import { isHttpError } from '../utils/http-error.js';

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const status = isHttpError(err) ? err.status : 500;
  const code = isHttpError(err) ? err.code : 'INTERNAL_ERROR';
  const message = err instanceof Error ? err.message : 'internal error';
  if (status >= 500) logger.error({ err, rid: res.locals.rid }, 'request error');
  else logger.warn({ err, rid: res.locals.rid }, 'request rejected');
  res.status(status).json({ error: { code, message } });
};
