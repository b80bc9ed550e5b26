import { randomUUID } from 'node:crypto';
import type { AllocationMethod, AllocationRun, TimeRange } from '../../shared/costAllocation.js';
import type { CostCollector } from '../collectors/costCollector.js';
import type { TelemetryCollector } from '../collectors/telemetryCollector.js';
import type { AllocationRepository } from '../dal/interfaces.js';
import type { AllocationEngine } from '../engine/allocationEngine.js';
import { HOUR_MS } from '../engine/windower.js';
import { createAppError, errorMessage, isSourceError } from '../errors.js';
import { logger } from '../observability/logger.js';
import { metricsRegistry } from '../observability/metrics.js';

export interface AllocationJobDependencies {
  telemetryCollector: TelemetryCollector;
  costCollector: CostCollector;
  engine: AllocationEngine;
  repository: AllocationRepository;
  lookbackHours: number;
  now?: () => Date;
  createRunId?: () => string;
}

export interface RunOptions {
  method?: AllocationMethod;
  range?: TimeRange;
}

/**
 * One collect → correlate → persist pass. Runs never overlap, and a run either writes its
 * whole batch or nothing beyond its own run row.
 */
export class AllocationJob {
  private inFlight: Promise<AllocationRun> | null = null;

  constructor(private readonly deps: AllocationJobDependencies) {}

  get isRunning(): boolean {
    return this.inFlight !== null;
  }

  async runOnce(options: RunOptions = {}): Promise<AllocationRun> {
    if (this.inFlight) {
      throw createAppError('An allocation run is already in progress', {
        statusCode: 409,
        code: 'RUN_IN_PROGRESS',
        recoverable: true
      });
    }

    this.inFlight = this.execute(options);
    try {
      return await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  private async execute(options: RunOptions): Promise<AllocationRun> {
    const now = this.deps.now ?? (() => new Date());
    const started = now();
    const method = options.method ?? this.deps.engine.defaultMethod;
    const range = options.range ?? {
      start: new Date(started.getTime() - this.deps.lookbackHours * HOUR_MS).toISOString(),
      end: started.toISOString()
    };

    const run: AllocationRun = {
      runId: this.deps.createRunId?.() ?? randomUUID(),
      startedAtUtc: started.toISOString(),
      completedAtUtc: null,
      status: 'ok',
      allocationMethod: method,
      telemetryCount: 0,
      costCount: 0,
      allocatedCount: 0,
      totalCost: 0,
      allocatedCost: 0,
      conservationViolations: 0,
      rejectedRecords: 0,
      errorMessage: null
    };

    logger.info('allocation_run_started', { runId: run.runId, allocationMethod: method, ...range });

    try {
      const [telemetry, costs] = await Promise.all([
        this.deps.telemetryCollector.collect(range),
        this.deps.costCollector.collect(range)
      ]);

      run.telemetryCount = telemetry.events.length;
      run.costCount = costs.events.length;
      run.rejectedRecords = telemetry.rejected + costs.rejected;

      if (costs.status === 'throttled') {
        return await this.finish({ ...run, status: 'skipped', errorMessage: 'Cost source throttled' }, now);
      }

      const result = this.deps.engine.run(telemetry.events, costs.events, method);
      const completed: AllocationRun = {
        ...run,
        completedAtUtc: now().toISOString(),
        allocatedCount: result.records.length,
        totalCost: result.totals.totalCost,
        allocatedCost: result.totals.allocatedCost,
        conservationViolations: result.violations.length
      };

      await this.deps.repository.writeRun({
        run: completed,
        records: result.records,
        telemetry: telemetry.events,
        costs: costs.events
      });

      metricsRegistry.incrementRunOutcome('ok');
      logger.info('allocation_run_completed', { ...completed });
      return completed;
    } catch (error) {
      const failed: AllocationRun = {
        ...run,
        status: 'error',
        errorMessage: errorMessage(error)
      };
      logger.error('allocation_run_failed', {
        runId: run.runId,
        error: failed.errorMessage,
        sourceErrorKind: isSourceError(error) ? error.kind : undefined
      });
      return this.finish(failed, now);
    }
  }

  private async finish(run: AllocationRun, now: () => Date): Promise<AllocationRun> {
    const finished = { ...run, completedAtUtc: now().toISOString() };
    metricsRegistry.incrementRunOutcome(finished.status);

    try {
      await this.deps.repository.saveRun(finished);
    } catch (error) {
      logger.error('allocation_run_record_failed', { runId: finished.runId, error: errorMessage(error) });
    }

    if (finished.status === 'skipped') {
      logger.warn('allocation_run_skipped', { runId: finished.runId, reason: finished.errorMessage });
    }
    return finished;
  }
}
