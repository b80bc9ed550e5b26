import { Router } from 'express';
import { z } from 'zod';
import { createAppError } from '../errors.js';
import type { AllocationRepository } from '../dal/interfaces.js';
import { parsedQuery, validateRequest } from '../middleware/validation.js';
import type { AllocationJob } from '../services/allocationJob.js';
import { allocationMethodSchema, ensureOrdered, isoTimestamp } from './querySchemas.js';

const listRunsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional().default(20)
});

const triggerRunBodySchema = z
  .object({
    method: allocationMethodSchema.optional(),
    start: isoTimestamp.optional(),
    end: isoTimestamp.optional()
  })
  .superRefine((value, ctx) => {
    if (Boolean(value.start) !== Boolean(value.end)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [value.start ? 'end' : 'start'],
        message: 'start and end must be provided together'
      });
    }
    ensureOrdered(ctx, value.start, value.end, 'end', 'start');
  });

export function createRunRouter(job: AllocationJob, repository: AllocationRepository): Router {
  const router = Router();

  router.get('/', validateRequest({ query: listRunsQuerySchema }), async (req, res, next) => {
    try {
      const { limit } = parsedQuery(listRunsQuerySchema, req);
      const items = await repository.listRuns(limit);
      res.json({ data: { items, total: items.length } });
    } catch (error) {
      next(error);
    }
  });

  router.get('/latest', validateRequest({}), async (_req, res, next) => {
    try {
      const run = await repository.getLatestRun();
      if (!run) {
        next(createAppError('No allocation run has been recorded yet', { statusCode: 404, code: 'NOT_FOUND', recoverable: true }));
        return;
      }
      res.json({ data: run });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', validateRequest({ body: triggerRunBodySchema }), async (req, res, next) => {
    try {
      const body = triggerRunBodySchema.parse(req.body ?? {});
      const run = await job.runOnce({
        method: body.method,
        range: body.start && body.end ? { start: body.start, end: body.end } : undefined
      });
      res.status(201).json({ data: run });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
