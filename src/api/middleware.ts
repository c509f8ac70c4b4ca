import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError, type ZodTypeAny, type output } from 'zod';
import { NotFoundError, RecordStoreError, ValidationError } from '../errors.js';
import type { Logger } from '../logger.js';

/**
 * Forward rejected promises from async route handlers to the error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Validate `req.query` against a schema, raising ValidationError with one
 * issue per failing parameter
 */
export function parseQuery<S extends ZodTypeAny>(schema: S, query: unknown): output<S> {
  try {
    return schema.parse(query);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new ValidationError(
        'Validation failed',
        err.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
      );
    }
    throw err;
  }
}

export function corsHeaders(): RequestHandler {
  return (req, res, next) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', '*');
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  };
}

export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      logger.info(
        { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - startedAt },
        'Request handled'
      );
    });
    next();
  };
}

/**
 * Map errors to response bodies. Storage details are logged, never sent.
 * Must be registered last.
 */
export function errorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ValidationError) {
      logger.warn({ path: req.path, issues: err.issues }, 'Request validation failed');
      res.status(422).json({ error: err.message, details: err.issues });
      return;
    }

    if (err instanceof NotFoundError) {
      logger.info({ path: req.path, context: err.context }, 'Resource not found');
      res.status(404).json({ error: 'Meeting not found' });
      return;
    }

    if (err instanceof RecordStoreError) {
      logger.error(
        { path: req.path, operation: err.operation, collection: err.collection, detail: err.detail },
        'Storage error'
      );
      res.status(502).json({ error: 'Storage unavailable' });
      return;
    }

    logger.error(
      {
        path: req.path,
        method: req.method,
        message: err instanceof Error ? err.message : String(err),
        stack: err instanceof Error ? err.stack : undefined
      },
      'Unhandled error'
    );
    res.status(500).json({ error: 'Internal server error' });
  };
}
