/**
 * API Middleware: request logging and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { PipelineError, TypedError, apiError, createTypedError } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ component: 'api' });

/** Log one line per completed request. */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on('finish', () => {
      log.debug('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - started,
      });
    });
    next();
  };
}

/** HTTP status for a typed error code. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code === 'RELEASE.VERSION_CONFLICT') return 409;
  if (error.code === 'RELEASE.INVALID_VERSION') return 400;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('MATRIX.')) return 422;
  if (error.code.startsWith('CONFIG.')) return 422;
  if (error.code === 'RELEASE.BARRIER') return 409;
  return 500;
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof PipelineError) {
    const status = getHttpStatus(err.typedError);
    log.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  // express.json() rejects malformed bodies with a status of its own
  if (err instanceof Error && 'status' in err && err.status === 400) {
    res.status(400).json(apiError(createTypedError({
      code: 'VALIDATION.MALFORMED_BODY',
      message: err.message,
    })));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  log.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json(apiError(createTypedError({
    code: 'SYSTEM.INTERNAL',
    message,
    retryable: false,
  })));
}
