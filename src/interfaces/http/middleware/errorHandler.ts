/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Sits at the very end of the middleware chain. Express 5 forwards rejected
 * promises from async handlers here, so controllers never wrap their bodies
 * in try/catch.
 *
 *   - Operational (AppError): logged at "warn"; the client gets the error's
 *     statusCode and message.
 *   - A malformed JSON body (from express.json()): 400.
 *   - Anything else: logged at "error"; the client gets a generic 500.
 *
 * Express recognises an error handler by its four parameters.
 */
import type { Logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { ErrorRequestHandler } from 'express';

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(log: Logger): ErrorRequestHandler {
  return (err: unknown, _req, res, _next) => {
    if (err instanceof AppError) {
      log.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
      res.status(err.statusCode).json({
        status: 'error',
        message: err.message,
      });
      return;
    }

    if (isBodyParseError(err)) {
      res.status(400).json({ status: 'error', message: 'Malformed JSON body' });
      return;
    }

    log.error({ err }, 'Unhandled error');
    res.status(500).json({
      status: 'error',
      message: 'Internal server error',
    });
  };
}
