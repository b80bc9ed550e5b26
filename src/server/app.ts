import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import type { AllocationMethod } from '../shared/costAllocation.js';
import { DEFAULT_ANALYTICS_CONFIG, DEFAULT_ENGINE_CONFIG, type AnalyticsConfig } from './config.js';
import type { AllocationRepository } from './dal/interfaces.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { observabilityMiddleware } from './middleware/observability.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { createAllocationRouter } from './routes/allocationRoutes.js';
import { createAnalyticsRouter } from './routes/analyticsRoutes.js';
import { createHealthRouter } from './routes/healthRoutes.js';
import { createRunRouter } from './routes/runRoutes.js';
import type { AllocationJob } from './services/allocationJob.js';
import type { SchedulerStatus } from './services/scheduler.js';

export interface CreateAppDependencies {
  repository: AllocationRepository;
  job: AllocationJob;
  analyticsConfig?: AnalyticsConfig;
  defaultMethod?: AllocationMethod;
  schedulerStatus?: () => SchedulerStatus;
}

export function createApp(dependencies: CreateAppDependencies) {
  const app = express();
  const { repository, job, schedulerStatus } = dependencies;

  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  app.use(requestIdMiddleware);
  app.use(observabilityMiddleware);

  app.use('/api/v1/health', createHealthRouter({ repository, schedulerStatus }));
  app.use('/api/v1/runs', createRunRouter(job, repository));
  app.use(
    '/api/v1/allocations',
    createAllocationRouter(repository, dependencies.defaultMethod ?? DEFAULT_ENGINE_CONFIG.allocationMethod)
  );
  app.use(
    '/api/v1/analytics',
    createAnalyticsRouter({ repository, config: dependencies.analyticsConfig ?? DEFAULT_ANALYTICS_CONFIG })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
