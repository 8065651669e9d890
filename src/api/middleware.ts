/**
 * API Middleware — request logging and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { apiError, TypedError, createTypedError, hasTypedError } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ component: 'api' });

/** Log one line per request once the response is finished. */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on('finish', () => {
      log.debug('Request', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - started,
      });
    });
    next();
  };
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (hasTypedError(err)) {
    const status = getHttpStatus(err.typedError);
    log.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  // express.json() reports malformed bodies with a 4xx `status`.
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    res.status(400).json(apiError(createTypedError({
      code: 'VALIDATION.MALFORMED_JSON',
      message: 'Request body is not valid JSON',
      retryable: false,
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

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('RATE_LIMIT.')) return 429;
  if (error.code === 'WORKFLOW.INVALID_STATE' || error.code === 'WORKFLOW.ALREADY_RUNNING') return 409;
  if (error.code.startsWith('PLANNER.')) return 422;
  if (error.code.startsWith('CIRCUIT.') || error.code.startsWith('PROVIDER.')) return 503;
  return 500;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Forward rejections of an async route handler to the error handler. */
export function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
