import type { ErrorRequestHandler, RequestHandler } from 'express';
import createError from 'http-errors';
import { logger } from '../logger.js';

export interface ErrorBody {
  error: string;
  code: string;
  details?: Record<string, string>;
}

const DEFAULT_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  404: 'NOT_FOUND',
  413: 'PAYLOAD_TOO_LARGE',
};

function stringRecord(value: unknown): Record<string, string> | undefined {
  if (value === null || typeof value !== 'object') return undefined;
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === 'string') out[k] = v;
  }
  return out;
}

export const notFound: RequestHandler = (req, _res, next) => {
  next(createError(404, `Route ${req.method} ${req.path} not found`, { code: 'NOT_FOUND' }));
};

export const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (!createError.isHttpError(err) || err.status >= 500) {
    logger.error({ err, method: req.method, path: req.path }, 'request failed');
    const body: ErrorBody = { error: 'internal server error', code: 'INTERNAL_ERROR' };
    return res.status(500).json(body);
  }

  let code = typeof err.code === 'string' ? err.code : DEFAULT_CODES[err.status] ?? 'CLIENT_ERROR';
  if (err.type === 'entity.parse.failed') code = 'INVALID_JSON';

  const body: ErrorBody = { error: err.expose ? err.message : 'bad request', code };
  const details = stringRecord(err.details);
  if (details) body.details = details;

  logger.warn({ status: err.status, code, method: req.method, path: req.path }, err.message);
  return res.status(err.status).json(body);
};
