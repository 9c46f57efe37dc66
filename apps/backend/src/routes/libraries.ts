import { Router, type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';

import type { DuplicateGroupRepository } from '../repositories/duplicateGroupRepository.js';
import type { LibraryPreferencesRepository } from '../repositories/libraryPreferencesRepository.js';
import type { MediaCatalog } from '../services/catalog/mediaCatalog.js';
import { HttpError } from '../middleware/errorHandler.js';

export interface LibrariesRouterOptions {
  catalog: MediaCatalog | null;
  groups: DuplicateGroupRepository;
  preferences: LibraryPreferencesRepository;
}

const reviewStatusSchema = z.enum(['pending', 'reviewed', 'ignored']);

const duplicatesQuerySchema = z.object({
  status: reviewStatusSchema.optional(),
});

const reviewBodySchema = z
  .object({
    status: reviewStatusSchema,
    primaryVersionId: z.string().trim().min(1).optional(),
  })
  .strict();

export const createLibrariesRouter = ({ catalog, groups, preferences }: LibrariesRouterOptions) => {
  const router = Router();

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    if (!catalog) {
      return next(new HttpError(503, 'Media catalog is not configured.'));
    }

    try {
      const libraries = await catalog.listLibraries();
      res.json({ libraries });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Failed to fetch libraries from the catalog.';
      next(new HttpError(502, message, { cause: error }));
    }
  });

  router.get('/:libraryId/duplicates', (req, res) => {
    const { status } = duplicatesQuerySchema.parse(req.query);
    const stored = groups.load(req.params.libraryId);
    const filtered = status ? stored.filter((group) => group.status === status) : stored;

    res.json({ libraryId: req.params.libraryId, total: filtered.length, groups: filtered });
  });

  router.get('/:libraryId/duplicates/:groupId', (req, res, next) => {
    const group = groups.findGroup(req.params.libraryId, req.params.groupId);
    if (!group) {
      return next(new HttpError(404, 'Duplicate group not found.'));
    }
    res.json(group);
  });

  router.patch('/:libraryId/duplicates/:groupId', (req, res, next) => {
    const body = reviewBodySchema.parse(req.body);
    const result = groups.updateReview(req.params.libraryId, req.params.groupId, body);

    if (!result.ok) {
      return result.reason === 'group-not-found'
        ? next(new HttpError(404, 'Duplicate group not found.'))
        : next(new HttpError(400, 'primaryVersionId must reference a member of the group.'));
    }

    res.json(result.group);
  });

  router.get('/:libraryId/preferences', (req, res) => {
    res.json(preferences.get(req.params.libraryId));
  });

  router.put('/:libraryId/preferences', (req, res) => {
    res.json(preferences.upsert(req.params.libraryId, req.body));
  });

  return router;
};

export default createLibrariesRouter;
