/**
 * Place Routes
 * Layer: Interfaces (HTTP)
 *
 * Mounted under `/api/v1/places`:
 *
 *   GET /api/v1/places?limit=25        →  controller.list
 *   GET /api/v1/places/export.csv      →  controller.exportCsv
 *   GET /api/v1/places/ChIJ...         →  controller.findById
 *
 * export.csv is registered before `/:id` so it is not taken for an id.
 */
import { PlaceController } from '@interfaces/http/controllers/PlaceController';
import { Router } from 'express';
import type { DependencyContainer } from 'tsyringe';

export function placeRoutes(di: DependencyContainer): Router {
  const router = Router();
  const controller = new PlaceController(di);

  router.get('/', controller.list);
  router.get('/export.csv', controller.exportCsv);
  router.get('/:id', controller.findById);

  return router;
}
