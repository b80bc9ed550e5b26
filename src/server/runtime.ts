import type { AppConfig } from './config.js';
import { CostCollector } from './collectors/costCollector.js';
import { DemoCostSource, DemoTelemetrySource } from './collectors/inMemorySources.js';
import type { CostSource, TelemetrySource } from './collectors/interfaces.js';
import { TelemetryCollector } from './collectors/telemetryCollector.js';
import { InMemoryAllocationStore } from './dal/inMemoryAllocationStore.js';
import type { AllocationRepository } from './dal/interfaces.js';
import { createSqliteAllocationStore } from './dal/sqlite/sqliteAllocationStore.js';
import { AllocationEngine } from './engine/allocationEngine.js';
import { AllocationJob } from './services/allocationJob.js';
import { AllocationScheduler } from './services/scheduler.js';

export interface Runtime {
  repository: AllocationRepository;
  job: AllocationJob;
  scheduler: AllocationScheduler | null;
  close: () => void;
}

export interface RuntimeSources {
  telemetry?: TelemetrySource;
  cost?: CostSource;
}

export function createRuntime(config: AppConfig, sources: RuntimeSources = {}): Runtime {
  const sqlite = config.persistence.backend === 'sqlite' ? createSqliteAllocationStore(config.persistence.sqlitePath) : null;
  const repository = sqlite?.store ?? new InMemoryAllocationStore();

  const collectorOptions = {
    maxRetryAttempts: config.collection.maxRetryAttempts,
    retryBaseDelayMs: config.collection.retryBaseDelayMs
  };

  const job = new AllocationJob({
    telemetryCollector: new TelemetryCollector(sources.telemetry ?? new DemoTelemetrySource(), collectorOptions),
    costCollector: new CostCollector(sources.cost ?? new DemoCostSource(), collectorOptions),
    engine: new AllocationEngine(config.engine),
    repository,
    lookbackHours: config.collection.lookbackHours
  });

  const scheduler = config.collection.schedulerEnabled
    ? new AllocationScheduler(job, {
        intervalMinutes: config.collection.intervalMinutes,
        runOnStartup: config.collection.runOnStartup
      })
    : null;

  return {
    repository,
    job,
    scheduler,
    close: () => {
      scheduler?.stop();
      sqlite?.close();
    }
  };
}
