import { Router } from 'express';
import type { AllocationRepository } from '../dal/interfaces.js';
import { validateRequest } from '../middleware/validation.js';
import type { SchedulerStatus } from '../services/scheduler.js';

export interface HealthDependencies {
  repository: AllocationRepository;
  schedulerStatus?: () => SchedulerStatus;
}

export function createHealthRouter({ repository, schedulerStatus }: HealthDependencies): Router {
  const router = Router();

  router.get('/', validateRequest({}), async (_req, res, next) => {
    try {
      const db = await repository.checkHealth();
      const latestRun = await repository.getLatestRun();
      const scheduler = schedulerStatus?.();

      res.json({
        data: {
          service: 'store-cost-attribution-api',
          status: db.ok ? 'ok' : 'degraded',
          checks: {
            api: 'up',
            db: db.ok ? 'up' : 'down',
            scheduler: scheduler ? (scheduler.active ? 'running' : 'stopped') : 'disabled'
          },
          persistenceBackend: db.backend,
          scheduler: scheduler ?? null,
          latestRun: latestRun
            ? { runId: latestRun.runId, status: latestRun.status, completedAtUtc: latestRun.completedAtUtc }
            : null,
          timestamp: new Date().toISOString()
        }
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
