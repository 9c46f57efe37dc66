import { Router } from 'express';
import { z } from 'zod';

import type { ScanJobRepository } from '../repositories/scanJobRepository.js';
import type { DuplicateScanService } from '../services/duplicateScanService.js';
import { HttpError } from '../middleware/errorHandler.js';

export interface ScansRouterOptions {
  scanService: DuplicateScanService | null;
  jobs: ScanJobRepository;
}

const startScanSchema = z
  .object({
    libraryId: z.string().trim().min(1).optional(),
  })
  .strict();

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export const createScansRouter = ({ scanService, jobs }: ScansRouterOptions) => {
  const router = Router();

  router.post('/', (req, res, next) => {
    if (!scanService) {
      return next(new HttpError(503, 'Media catalog is not configured.'));
    }

    const { libraryId } = startScanSchema.parse(req.body ?? {});
    const result = scanService.startScan(libraryId ? [libraryId] : undefined);

    switch (result.status) {
      case 'started':
        return res.status(202).json({ job: result.job });
      case 'busy':
        return next(new HttpError(409, 'A duplicate scan is already running.', { details: { owner: result.owner } }));
      case 'disabled':
        return next(new HttpError(503, 'Scanner is disabled.'));
    }
  });

  router.get('/', (req, res) => {
    const { limit } = listQuerySchema.parse(req.query);
    res.json({ jobs: jobs.listRecent(limit) });
  });

  router.get('/:jobId', (req, res, next) => {
    const job = jobs.getById(req.params.jobId);
    if (!job) {
      return next(new HttpError(404, 'Scan job not found.'));
    }
    res.json(job);
  });

  router.post('/:jobId/cancel', (req, res, next) => {
    const job = jobs.getById(req.params.jobId);
    if (!job) {
      return next(new HttpError(404, 'Scan job not found.'));
    }

    if (!scanService?.cancel(job.jobId)) {
      return next(new HttpError(409, 'Scan job is not running.'));
    }

    res.status(202).json({ jobId: job.jobId, cancelling: true });
  });

  return router;
};

export default createScansRouter;
