/**
 * Run Routes
 * Layer: Interfaces (HTTP)
 *
 *   POST /api/v1/runs  { "queries": ["plumber St. John's NL"], "classifyLimit": 20 }
 *
 * The CLI script (npm run run:pipeline) is the usual way to run the pipeline;
 * this endpoint exists for programmatic triggering.
 */
import { RunController } from '@interfaces/http/controllers/RunController';
import { Router } from 'express';
import type { DependencyContainer } from 'tsyringe';

export function runRoutes(di: DependencyContainer): Router {
  const router = Router();
  const controller = new RunController(di);

  router.post('/runs', controller.create);

  return router;
}
