/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Two kinds of failure show up in this app:
 *
 *   1. Operational errors — a blank place id, an unknown place on lookup, a
 *      missing API key, a 503 from Google, a model reply that is not JSON.
 *      These carry a status code and a message that is safe to show.
 *
 *   2. Programmer errors — everything else. The HTTP error handler turns them
 *      into a generic 500; the pipeline logs them per entity and moves on.
 *
 * `Object.setPrototypeOf(this, new.target.prototype)` keeps `instanceof`
 * working for subclasses whatever the compilation target.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier: string) {
    super(`${resource} not found: ${identifier}`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** Missing or invalid settings (bad env, absent API key). */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500);
  }
}

/** A non-2xx answer or an unusable body from an external API. */
export class UpstreamError extends AppError {
  /** HTTP status returned by the upstream service; null when none was received. */
  public readonly upstreamStatus: number | null;

  constructor(message: string, upstreamStatus: number | null = null) {
    super(message, 502);
    this.upstreamStatus = upstreamStatus;
  }
}

/** The language model answered with something that cannot be turned into a Classification. */
export class ClassificationError extends AppError {
  constructor(message: string) {
    super(message, 502);
  }
}
