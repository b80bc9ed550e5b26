import { Router } from 'express';
import { z } from 'zod';
import type { TimeRange } from '../../shared/costAllocation.js';
import { recommendAllocationMethod } from '../analytics/allocationMethodSelection.js';
import { detectAnomalies } from '../analytics/anomalyDetection.js';
import { decayWeightedCorrelation } from '../analytics/decayWeightedCorrelation.js';
import { predictCosts } from '../analytics/predictiveAllocation.js';
import { analyzeSpillover } from '../analytics/spilloverAnalysis.js';
import { analyzeUsagePatterns } from '../analytics/usagePatterns.js';
import type { AnalyticsConfig } from '../config.js';
import type { AllocationRepository } from '../dal/interfaces.js';
import { HOUR_MS } from '../engine/windower.js';
import { parsedQuery, validateRequest } from '../middleware/validation.js';
import { ensureOrdered, isoTimestamp } from './querySchemas.js';

const DAY_MS = 24 * HOUR_MS;

const rangeQuerySchema = z
  .object({
    start: isoTimestamp.optional(),
    end: isoTimestamp.optional()
  })
  .superRefine((value, ctx) => ensureOrdered(ctx, value.start, value.end, 'end', 'start'));

const patternsQuerySchema = z
  .object({
    start: isoTimestamp.optional(),
    end: isoTimestamp.optional(),
    lookbackDays: z.coerce.number().positive().max(90).optional()
  })
  .superRefine((value, ctx) => ensureOrdered(ctx, value.start, value.end, 'end', 'start'));

const anomaliesQuerySchema = z
  .object({
    currentStart: isoTimestamp.optional(),
    end: isoTimestamp.optional(),
    lookbackDays: z.coerce.number().positive().max(90).optional()
  })
  .superRefine((value, ctx) => ensureOrdered(ctx, value.currentStart, value.end, 'end', 'currentStart'));

const predictionsQuerySchema = z
  .object({
    historyStart: isoTimestamp.optional(),
    currentStart: isoTimestamp.optional(),
    end: isoTimestamp.optional()
  })
  .superRefine((value, ctx) => {
    ensureOrdered(ctx, value.historyStart, value.currentStart, 'currentStart', 'historyStart');
    ensureOrdered(ctx, value.currentStart, value.end, 'end', 'currentStart');
  });

const decayQuerySchema = z
  .object({
    start: isoTimestamp.optional(),
    end: isoTimestamp.optional(),
    decayHours: z.coerce.number().positive().max(720).optional()
  })
  .superRefine((value, ctx) => ensureOrdered(ctx, value.start, value.end, 'end', 'start'));

function toIso(value: string): string {
  return new Date(value).toISOString();
}

function before(isoValue: string, spanMs: number): string {
  return new Date(new Date(isoValue).getTime() - spanMs).toISOString();
}

export interface AnalyticsDependencies {
  repository: AllocationRepository;
  config: AnalyticsConfig;
  now?: () => Date;
}

export function createAnalyticsRouter({ repository, config, now = () => new Date() }: AnalyticsDependencies): Router {
  const router = Router();

  const resolveRange = (start: string | undefined, end: string | undefined, defaultSpanMs: number): TimeRange => {
    const resolvedEnd = end ? toIso(end) : now().toISOString();
    return { start: start ? toIso(start) : before(resolvedEnd, defaultSpanMs), end: resolvedEnd };
  };

  router.get('/patterns', validateRequest({ query: patternsQuerySchema }), async (req, res, next) => {
    try {
      const query = parsedQuery(patternsQuerySchema, req);
      const lookbackDays = query.lookbackDays ?? config.patternLookbackDays;
      const range = resolveRange(query.start, query.end, lookbackDays * DAY_MS);
      const telemetry = await repository.getTelemetry(range);
      const items = analyzeUsagePatterns(telemetry, { lookbackDays, now: new Date(range.end) });

      res.json({ data: { range, lookbackDays, items } });
    } catch (error) {
      next(error);
    }
  });

  router.get('/anomalies', validateRequest({ query: anomaliesQuerySchema }), async (req, res, next) => {
    try {
      const query = parsedQuery(anomaliesQuerySchema, req);
      const lookbackDays = query.lookbackDays ?? config.patternLookbackDays;
      const current = resolveRange(query.currentStart, query.end, HOUR_MS);
      const history = { start: before(current.start, lookbackDays * DAY_MS), end: current.start };

      const patterns = analyzeUsagePatterns(await repository.getTelemetry(history), {
        lookbackDays,
        now: new Date(history.end)
      });
      const items = detectAnomalies(await repository.getTelemetry(current), patterns, {
        deviationThreshold: config.anomalyDeviationThreshold,
        highSeverityThreshold: config.anomalyHighSeverityThreshold
      });

      res.json({ data: { history, current, patternsLearned: patterns.length, items } });
    } catch (error) {
      next(error);
    }
  });

  router.get('/predictions', validateRequest({ query: predictionsQuerySchema }), async (req, res, next) => {
    try {
      const query = parsedQuery(predictionsQuerySchema, req);
      const current = resolveRange(query.currentStart, query.end, HOUR_MS);
      const history = {
        start: query.historyStart ? toIso(query.historyStart) : before(current.start, config.patternLookbackDays * DAY_MS),
        end: current.start
      };

      const items = predictCosts(
        await repository.getAllocations(history),
        await repository.getTelemetry(current),
        { minHistoryPoints: config.predictionMinHistory }
      );

      res.json({ data: { history, current, items } });
    } catch (error) {
      next(error);
    }
  });

  router.get('/spillover', validateRequest({ query: rangeQuerySchema }), async (req, res, next) => {
    try {
      const query = parsedQuery(rangeQuerySchema, req);
      const range = resolveRange(query.start, query.end, config.patternLookbackDays * DAY_MS);
      const items = analyzeSpillover(await repository.getAllocations(range), {
        correlationThreshold: config.spilloverCorrelationThreshold
      });

      res.json({ data: { range, items } });
    } catch (error) {
      next(error);
    }
  });

  router.get('/allocation-method', validateRequest({ query: rangeQuerySchema }), async (req, res, next) => {
    try {
      const query = parsedQuery(rangeQuerySchema, req);
      const range = resolveRange(query.start, query.end, DAY_MS);
      const recommendation = recommendAllocationMethod(
        await repository.getTelemetry(range),
        await repository.getCosts(range)
      );

      res.json({ data: { range, ...recommendation } });
    } catch (error) {
      next(error);
    }
  });

  router.get('/decay-weighted', validateRequest({ query: decayQuerySchema }), async (req, res, next) => {
    try {
      const query = parsedQuery(decayQuerySchema, req);
      const decayHours = query.decayHours ?? config.decayHours;
      const range = resolveRange(query.start, query.end, DAY_MS);
      const items = decayWeightedCorrelation(await repository.getTelemetry(range), await repository.getCosts(range), {
        decayHours,
        referenceTime: new Date(range.end)
      });

      res.json({ data: { range, decayHours, items } });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
