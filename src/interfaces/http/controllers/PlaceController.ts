/**
 * Place Controller — Ranked View, CSV Export & Lookup
 * Layer: Interfaces (HTTP)
 *
 * Thin: parse input, call the service or repository, send the response.
 * Arrow-function members keep `this` bound when Express calls them.
 */
import type { ExportService } from '@application/services/ExportService';
import { TOKENS } from '@core/types';
import type { IPlaceRepository } from '@domain/interfaces/IPlaceRepository';
import { elapsedMs } from '@interfaces/http/middleware/requestTimer';
import { parseInput } from '@interfaces/http/middleware/validation';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '@shared/constants';
import { NotFoundError } from '@shared/errors/AppError';
import type { Request, Response } from 'express';
import type { DependencyContainer } from 'tsyringe';
import { z } from 'zod/v4';

export const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
});

export const EXPORT_FILENAME = 'ranked.csv';

export class PlaceController {
  private exports: ExportService;
  private repo: IPlaceRepository;

  constructor(di: DependencyContainer) {
    this.exports = di.resolve<ExportService>(TOKENS.ExportService);
    this.repo = di.resolve<IPlaceRepository>(TOKENS.PlaceRepository);
  }

  list = async (req: Request, res: Response): Promise<void> => {
    const { limit } = parseInput(listQuerySchema, req.query);
    const places = await this.exports.rankedPlaces(limit);

    res.status(200).json({
      status: 'success',
      data: places,
      meta: { count: places.length, limit, totalTimeMs: elapsedMs(req) },
    });
  };

  exportCsv = async (_req: Request, res: Response): Promise<void> => {
    const { csv } = await this.exports.toCsv();

    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="${EXPORT_FILENAME}"`);
    res.status(200).send(csv);
  };

  findById = async (req: Request, res: Response): Promise<void> => {
    const { id } = parseInput(z.object({ id: z.string().min(1) }), req.params);
    const place = await this.repo.findById(id);
    if (!place) throw new NotFoundError('Place', id);

    res.status(200).json({
      status: 'success',
      data: place,
      meta: { totalTimeMs: elapsedMs(req) },
    });
  };
}
