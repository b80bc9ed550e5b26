import type { RunStatus } from '../../shared/costAllocation.js';
import type { RequestMetrics } from '../types.js';

interface CounterMetric {
  key: string;
  value: number;
}

function increment(counters: Map<string, number>, key: string, by = 1): void {
  counters.set(key, (counters.get(key) ?? 0) + by);
}

function toCounters(counters: Map<string, number>): CounterMetric[] {
  return [...counters.entries()].map(([key, value]) => ({ key, value }));
}

class MetricsRegistry {
  private requestDurations: RequestMetrics[] = [];
  private malformedFields = new Map<string, number>();
  private rejectedRecords = new Map<string, number>();
  private sourceFailures = new Map<string, number>();
  private runOutcomes = new Map<string, number>();
  private conservationViolations = 0;
  private uncorrelatedBatches = 0;
  private sqliteWriteLockWaitMs: number[] = [];

  recordApiRequestDuration(metric: RequestMetrics): void {
    this.requestDurations.push(metric);
  }

  incrementMalformedField(field: string, by = 1): void {
    increment(this.malformedFields, field, by);
  }

  incrementRejectedRecords(stream: 'telemetry' | 'cost', by = 1): void {
    increment(this.rejectedRecords, stream, by);
  }

  incrementSourceFailure(source: string): void {
    increment(this.sourceFailures, source);
  }

  incrementRunOutcome(status: RunStatus): void {
    increment(this.runOutcomes, status);
  }

  incrementConservationViolation(by = 1): void {
    this.conservationViolations += by;
  }

  incrementUncorrelatedBatch(): void {
    this.uncorrelatedBatches += 1;
  }

  observeSqliteWriteLockWait(waitMs: number): void {
    this.sqliteWriteLockWaitMs.push(waitMs);
  }

  getMalformedFields(): CounterMetric[] {
    return toCounters(this.malformedFields);
  }

  getRejectedRecords(): CounterMetric[] {
    return toCounters(this.rejectedRecords);
  }

  getSourceFailures(): CounterMetric[] {
    return toCounters(this.sourceFailures);
  }

  getRunOutcomes(): CounterMetric[] {
    return toCounters(this.runOutcomes);
  }

  getConservationViolations(): number {
    return this.conservationViolations;
  }

  getUncorrelatedBatches(): number {
    return this.uncorrelatedBatches;
  }

  getSqliteWriteLockWaitMs(): number[] {
    return [...this.sqliteWriteLockWaitMs];
  }

  getRequestDurations(): RequestMetrics[] {
    return [...this.requestDurations];
  }

  reset(): void {
    this.requestDurations = [];
    this.malformedFields = new Map();
    this.rejectedRecords = new Map();
    this.sourceFailures = new Map();
    this.runOutcomes = new Map();
    this.conservationViolations = 0;
    this.uncorrelatedBatches = 0;
    this.sqliteWriteLockWaitMs = [];
  }
}

export const metricsRegistry = new MetricsRegistry();
