import type {
  AllocatedRecord,
  AllocationRun,
  CostEvent,
  TelemetryEvent,
  TimeRange
} from '../../shared/costAllocation.js';
import { groupKey, toMillis } from '../engine/windower.js';
import { partitionPathOf, type AllocationBatch, type AllocationQuery, type AllocationRepository } from './interfaces.js';

function inRange(timestamp: string, range: TimeRange): boolean {
  const ms = toMillis(timestamp);
  return ms >= toMillis(range.start) && ms < toMillis(range.end);
}

function matches(record: AllocatedRecord, query: AllocationQuery): boolean {
  const windowMs = toMillis(record.windowStartUtc);
  return (
    (!query.date || partitionPathOf(record.windowStartUtc) === partitionPathOf(query.date)) &&
    (!query.deviceId || record.deviceId === query.deviceId) &&
    (!query.storeNumber || record.storeNumber === query.storeNumber) &&
    (!query.resourceId || record.resourceId === query.resourceId) &&
    (!query.start || windowMs >= toMillis(query.start)) &&
    (!query.end || windowMs < toMillis(query.end))
  );
}

export class InMemoryAllocationStore implements AllocationRepository {
  private readonly runs = new Map<string, AllocationRun>();
  private readonly records = new Map<string, AllocatedRecord>();
  private readonly telemetry = new Map<string, TelemetryEvent>();
  private readonly costs = new Map<string, CostEvent>();

  async writeRun(batch: AllocationBatch): Promise<void> {
    this.runs.set(batch.run.runId, { ...batch.run });
    batch.telemetry.forEach((event) => {
      const key = groupKey(
        event.timestamp,
        event.deviceId,
        event.storeNumber,
        event.resourceId,
        String(event.tokensUsed),
        String(event.statusCode),
        String(event.responseTimeMs)
      );
      if (!this.telemetry.has(key)) {
        this.telemetry.set(key, { ...event });
      }
    });
    batch.costs.forEach((event) => {
      this.costs.set(groupKey(event.resourceId, event.usageTimestamp, event.meterName), { ...event });
    });
    // A re-allocated group replaces every member row it had, not only the members it still has.
    const groups = new Set(batch.records.map((record) => groupKey(record.windowStartUtc, record.resourceId)));
    [...this.records.entries()].forEach(([key, record]) => {
      if (groups.has(groupKey(record.windowStartUtc, record.resourceId))) {
        this.records.delete(key);
      }
    });
    batch.records.forEach((record) => {
      this.records.set(groupKey(record.windowStartUtc, record.resourceId, record.deviceId, record.storeNumber), {
        ...record
      });
    });
  }

  async saveRun(run: AllocationRun): Promise<void> {
    this.runs.set(run.runId, { ...run });
  }

  async listRuns(limit: number): Promise<AllocationRun[]> {
    return [...this.runs.values()]
      .sort(
        (left, right) =>
          right.startedAtUtc.localeCompare(left.startedAtUtc) || right.runId.localeCompare(left.runId)
      )
      .slice(0, limit)
      .map((run) => ({ ...run }));
  }

  async getLatestRun(): Promise<AllocationRun | null> {
    const [latest] = await this.listRuns(1);
    return latest ?? null;
  }

  async getAllocations(query: AllocationQuery): Promise<AllocatedRecord[]> {
    return [...this.records.values()]
      .filter((record) => matches(record, query))
      .sort(
        (left, right) =>
          left.windowStartUtc.localeCompare(right.windowStartUtc) ||
          left.resourceId.localeCompare(right.resourceId) ||
          left.deviceId.localeCompare(right.deviceId) ||
          left.storeNumber.localeCompare(right.storeNumber)
      )
      .map((record) => ({ ...record }));
  }

  async getTelemetry(range: TimeRange): Promise<TelemetryEvent[]> {
    return [...this.telemetry.values()]
      .filter((event) => inRange(event.timestamp, range))
      .sort((left, right) => left.timestamp.localeCompare(right.timestamp));
  }

  async getCosts(range: TimeRange): Promise<CostEvent[]> {
    return [...this.costs.values()]
      .filter((event) => inRange(event.usageTimestamp, range))
      .sort((left, right) => left.usageTimestamp.localeCompare(right.usageTimestamp));
  }

  async checkHealth(): Promise<{ ok: boolean; backend: 'memory' }> {
    return { ok: true, backend: 'memory' };
  }
}
