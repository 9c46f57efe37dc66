import { Router } from 'express';
import { z } from 'zod';

import type { DeletionAuditRepository } from '../repositories/deletionAuditRepository.js';
import { HttpError } from '../middleware/errorHandler.js';
import { isAuditMonthKey, parseTimestamp } from '../utils/timestamps.js';

export interface AuditRouterOptions {
  audit: DeletionAuditRepository;
}

const timestampParam = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value.trim() === '') {
      return null;
    }
    const date = parseTimestamp(value);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid timestamp' });
      return z.NEVER;
    }
    return date;
  });

const rangeQuerySchema = z.object({
  from: timestampParam,
  to: timestampParam,
});

const auditRecordSchema = z
  .object({
    groupId: z.string().trim().min(1),
    itemId: z.string().trim().min(1),
    filePath: z.string().trim().min(1),
    qualityScore: z.number().int().min(0).max(100).default(0),
    deletionReason: z.string().default(''),
    userInitiated: z.boolean().default(false),
    userId: z.string().trim().min(1).nullable().default(null),
    success: z.boolean(),
    errorMessage: z.string().nullable().default(null),
    timestamp: timestampParam,
  })
  .strict();

export const createAuditRouter = ({ audit }: AuditRouterOptions) => {
  const router = Router();

  router.get('/', (req, res) => {
    const { from, to } = rangeQuerySchema.parse(req.query);
    res.json({ records: audit.list({ from, to }) });
  });

  router.post('/', (req, res) => {
    const { timestamp, ...record } = auditRecordSchema.parse(req.body);
    res.status(201).json(audit.append({ ...record, timestamp: timestamp ?? undefined }));
  });

  router.get('/months', (_req, res) => {
    res.json({ months: audit.listMonths() });
  });

  router.get('/months/:month', (req, res, next) => {
    const { month } = req.params;
    if (!isAuditMonthKey(month)) {
      return next(new HttpError(400, 'Month must be formatted as YYYY_MM.'));
    }

    res.attachment(`deletions_${month}.jsonl`);
    res.type('application/x-ndjson');
    res.send(audit.exportMonth(month));
  });

  return router;
};

export default createAuditRouter;
