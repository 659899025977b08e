/**
 * Run Controller — HTTP Trigger for the Pipeline
 * Layer: Interfaces (HTTP)
 *
 * POST /runs validates the body and runs discovery → details →
 * classification synchronously, answering with the run summary. Runs are
 * metered (every query, details call and classification costs money), so the
 * body bounds how much one request can spend.
 */
import type { PipelineService } from '@application/services/PipelineService';
import { TOKENS } from '@core/types';
import { parseInput } from '@interfaces/http/middleware/validation';
import { MAX_RUN_QUERIES } from '@shared/constants';
import type { Request, Response } from 'express';
import type { DependencyContainer } from 'tsyringe';
import { z } from 'zod/v4';

export const runBodySchema = z.object({
  queries: z.array(z.string().trim().min(1)).min(1).max(MAX_RUN_QUERIES),
  maxPages: z.number().int().min(1).max(10).optional(),
  detailsLimit: z.number().int().min(0).optional(),
  classifyLimit: z.number().int().min(0).optional(),
});

export class RunController {
  private pipeline: PipelineService;

  constructor(di: DependencyContainer) {
    this.pipeline = di.resolve<PipelineService>(TOKENS.PipelineService);
  }

  create = async (req: Request, res: Response): Promise<void> => {
    const body = parseInput(runBodySchema, req.body);
    const summary = await this.pipeline.run(body);

    res.status(200).json({ status: 'success', data: summary });
  };
}
