/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * Pino's HTTP plugin over the application logger: one line per response with
 * method, URL, status code and response time, in the same format (JSON in
 * prod, pretty in dev) as every other log line.
 */
import type { Logger } from '@core/logger';
import pinoHttp from 'pino-http';

export function requestLogger(logger: Logger) {
  return pinoHttp({ logger });
}
