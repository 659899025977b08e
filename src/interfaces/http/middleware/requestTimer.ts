/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps req.requestStartTime as the request enters the pipeline; controllers
 * report `meta.totalTimeMs` from it. Registered first so body parsing and
 * logging are inside the measurement.
 */
/// <reference path="../../../shared/express.d.ts" />
import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}

export function elapsedMs(req: Request): number | undefined {
  return req.requestStartTime != null ? Math.round(Date.now() - req.requestStartTime) : undefined;
}
