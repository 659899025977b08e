/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Assembles a new Express app over a DI container. Tests build one over an
 * in-memory container; server.ts builds one over the real one.
 *
 * Middleware order:
 *   1. requestTimer  — req.requestStartTime for meta.totalTimeMs.
 *   2. helmet()      — security headers.
 *   3. cors()        — cross-origin access for dashboards.
 *   4. compression() — gzip response bodies (the CSV in particular).
 *   5. express.json() — req.body.
 *   6. requestLogger — one pino line per request.
 *   7. Routes.
 *   8. errorHandler  — last; catches errors from every route above.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { placeRoutes } from '@interfaces/http/routes/placeRoutes';
import { runRoutes } from '@interfaces/http/routes/runRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import type { DependencyContainer } from 'tsyringe';

export function createApp(di: DependencyContainer): express.Express {
  const log = di.resolve<Logger>(TOKENS.Logger);
  const app = express();

  app.use(requestTimer);

  app.use(helmet());
  app.use(cors());
  app.use(compression());

  app.use(express.json());

  app.use(requestLogger(log));

  app.use('/api/v1', healthRoutes);
  app.use('/api/v1/places', placeRoutes(di));
  app.use('/api/v1', runRoutes(di));

  app.use(errorHandler(log));

  return app;
}
