import { Router } from 'express';
import { z } from 'zod';
import type { AllocationMethod } from '../../shared/costAllocation.js';
import type { AllocationRepository } from '../dal/interfaces.js';
import { analyzeDevices, summarizeAllocations } from '../engine/summary.js';
import { parsedQuery, validateRequest } from '../middleware/validation.js';
import { allocationMethodSchema, calendarDate } from './querySchemas.js';

const optionalText = z.string().trim().min(1).optional();

const allocationsQuerySchema = z.object({
  date: calendarDate.optional(),
  deviceId: optionalText,
  storeNumber: optionalText,
  resourceId: optionalText.transform((value) => value?.toLowerCase()),
  limit: z.coerce.number().int().min(1).max(5000).optional().default(500)
});

const summaryQuerySchema = z.object({
  date: calendarDate.optional(),
  method: allocationMethodSchema.optional()
});

export function createAllocationRouter(repository: AllocationRepository, defaultMethod: AllocationMethod): Router {
  const router = Router();

  router.get('/', validateRequest({ query: allocationsQuerySchema }), async (req, res, next) => {
    try {
      const { limit, ...query } = parsedQuery(allocationsQuerySchema, req);
      const records = await repository.getAllocations(query);
      res.json({ data: { items: records.slice(0, limit), total: records.length } });
    } catch (error) {
      next(error);
    }
  });

  router.get('/summary', validateRequest({ query: summaryQuerySchema }), async (req, res, next) => {
    try {
      const query = parsedQuery(summaryQuerySchema, req);
      const records = await repository.getAllocations({ date: query.date });
      const method = query.method ?? records[0]?.allocationMethod ?? defaultMethod;

      res.json({
        data: {
          date: query.date ?? null,
          summary: summarizeAllocations(records, method),
          analytics: analyzeDevices(records)
        }
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
