import type Database from 'better-sqlite3';
import type {
  AllocatedRecord,
  AllocationRun,
  CostEvent,
  TelemetryEvent,
  TimeRange
} from '../../../shared/costAllocation.js';
import { groupKey } from '../../engine/windower.js';
import { logger } from '../../observability/logger.js';
import {
  partitionPathOf,
  type AllocationBatch,
  type AllocationQuery,
  type AllocationRepository
} from '../interfaces.js';
import {
  allocatedRecordSchema,
  allocationRunRowSchema,
  rawCostRowSchema,
  rawTelemetryRowSchema,
  recordJsonRowSchema
} from '../recordSchemas.js';
import { applySqliteMigrations } from './migrations.js';
import { createSqliteContext, inTransaction, withSqliteRetry, type SqliteContext } from './database.js';

const RUN_COLUMNS = `run_id, started_at_utc, completed_at_utc, status, allocation_method, telemetry_count, cost_count,
  allocated_count, total_cost, allocated_cost, conservation_violations, rejected_records, error_message`;

export class SqliteAllocationStore implements AllocationRepository {
  constructor(private readonly db: Database.Database) {}

  async writeRun(batch: AllocationBatch): Promise<void> {
    withSqliteRetry(() => {
      inTransaction(this.db, () => {
        this.upsertRun(batch.run);
        this.insertTelemetry(batch.run.runId, batch.telemetry);
        this.upsertCosts(batch.run.runId, batch.costs);
        this.upsertRecords(batch.run.runId, batch.records);
      });
    });

    logger.debug('sqlite_batch_written', {
      runId: batch.run.runId,
      records: batch.records.length,
      telemetry: batch.telemetry.length,
      costs: batch.costs.length
    });
  }

  async saveRun(run: AllocationRun): Promise<void> {
    withSqliteRetry(() => this.upsertRun(run));
  }

  async listRuns(limit: number): Promise<AllocationRun[]> {
    const rows = this.db
      .prepare(`SELECT ${RUN_COLUMNS} FROM allocation_runs ORDER BY started_at_utc DESC, run_id DESC LIMIT ?`)
      .all(limit);
    return rows.map((row) => allocationRunRowSchema.parse(row));
  }

  async getLatestRun(): Promise<AllocationRun | null> {
    const [latest] = await this.listRuns(1);
    return latest ?? null;
  }

  async getAllocations(query: AllocationQuery): Promise<AllocatedRecord[]> {
    const clauses: string[] = [];
    const params: string[] = [];

    if (query.date) {
      clauses.push('partition_path = ?');
      params.push(partitionPathOf(query.date));
    }
    if (query.deviceId) {
      clauses.push('device_id = ?');
      params.push(query.deviceId);
    }
    if (query.storeNumber) {
      clauses.push('store_number = ?');
      params.push(query.storeNumber);
    }
    if (query.resourceId) {
      clauses.push('resource_id = ?');
      params.push(query.resourceId);
    }
    if (query.start) {
      clauses.push('window_start_utc >= ?');
      params.push(new Date(query.start).toISOString());
    }
    if (query.end) {
      clauses.push('window_start_utc < ?');
      params.push(new Date(query.end).toISOString());
    }

    const where = clauses.length ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = this.db
      .prepare(
        `SELECT record_json FROM allocated_records ${where}
         ORDER BY window_start_utc, resource_id, device_id, store_number`
      )
      .all(...params);

    return rows.map((row) => allocatedRecordSchema.parse(JSON.parse(recordJsonRowSchema.parse(row).record_json)));
  }

  async getTelemetry(range: TimeRange): Promise<TelemetryEvent[]> {
    const rows = this.db
      .prepare(
        `SELECT timestamp_utc, device_id, store_number, resource_id, tokens_used, status_code, response_time_ms
         FROM raw_telemetry WHERE timestamp_utc >= ? AND timestamp_utc < ? ORDER BY timestamp_utc`
      )
      .all(new Date(range.start).toISOString(), new Date(range.end).toISOString());
    return rows.map((row) => rawTelemetryRowSchema.parse(row));
  }

  async getCosts(range: TimeRange): Promise<CostEvent[]> {
    const rows = this.db
      .prepare(
        `SELECT resource_id, usage_timestamp_utc, meter_name, cost, usage_quantity, currency, service_name
         FROM raw_costs WHERE usage_timestamp_utc >= ? AND usage_timestamp_utc < ? ORDER BY usage_timestamp_utc`
      )
      .all(new Date(range.start).toISOString(), new Date(range.end).toISOString());
    return rows.map((row) => rawCostRowSchema.parse(row));
  }

  async checkHealth(): Promise<{ ok: boolean; backend: 'sqlite' }> {
    try {
      this.db.prepare('SELECT 1').get();
      return { ok: true, backend: 'sqlite' };
    } catch (error) {
      logger.error('sqlite_health_check_failed', { error: error instanceof Error ? error.message : String(error) });
      return { ok: false, backend: 'sqlite' };
    }
  }

  private upsertRun(run: AllocationRun): void {
    this.db
      .prepare(
        `INSERT INTO allocation_runs(${RUN_COLUMNS})
         VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(run_id) DO UPDATE SET
           completed_at_utc=excluded.completed_at_utc,
           status=excluded.status,
           telemetry_count=excluded.telemetry_count,
           cost_count=excluded.cost_count,
           allocated_count=excluded.allocated_count,
           total_cost=excluded.total_cost,
           allocated_cost=excluded.allocated_cost,
           conservation_violations=excluded.conservation_violations,
           rejected_records=excluded.rejected_records,
           error_message=excluded.error_message`
      )
      .run(
        run.runId,
        run.startedAtUtc,
        run.completedAtUtc,
        run.status,
        run.allocationMethod,
        run.telemetryCount,
        run.costCount,
        run.allocatedCount,
        run.totalCost,
        run.allocatedCost,
        run.conservationViolations,
        run.rejectedRecords,
        run.errorMessage
      );
  }

  // Identical events re-fetched by overlapping lookbacks are stored once.
  private insertTelemetry(runId: string, events: TelemetryEvent[]): void {
    const insert = this.db.prepare(
      `INSERT OR IGNORE INTO raw_telemetry(
         timestamp_utc, device_id, store_number, resource_id, tokens_used, status_code, response_time_ms, run_id
       ) VALUES(?, ?, ?, ?, ?, ?, ?, ?)`
    );
    events.forEach((event) => {
      insert.run(
        event.timestamp,
        event.deviceId,
        event.storeNumber,
        event.resourceId,
        event.tokensUsed,
        event.statusCode,
        event.responseTimeMs,
        runId
      );
    });
  }

  // Billing rows can be restated; the latest fetch wins.
  private upsertCosts(runId: string, events: CostEvent[]): void {
    const upsert = this.db.prepare(
      `INSERT INTO raw_costs(resource_id, usage_timestamp_utc, meter_name, cost, usage_quantity, currency, service_name, run_id)
       VALUES(?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(resource_id, usage_timestamp_utc, meter_name) DO UPDATE SET
         cost=excluded.cost,
         usage_quantity=excluded.usage_quantity,
         currency=excluded.currency,
         service_name=excluded.service_name,
         run_id=excluded.run_id`
    );
    events.forEach((event) => {
      upsert.run(
        event.resourceId,
        event.usageTimestamp,
        event.meterName,
        event.cost,
        event.usageQuantity,
        event.currency,
        event.serviceName,
        runId
      );
    });
  }

  // A re-allocated (window, resource) group replaces all of its stored members.
  private upsertRecords(runId: string, records: AllocatedRecord[]): void {
    const clearGroup = this.db.prepare('DELETE FROM allocated_records WHERE window_start_utc = ? AND resource_id = ?');
    const groups = new Map(records.map((record) => [groupKey(record.windowStartUtc, record.resourceId), record]));
    groups.forEach((record) => {
      clearGroup.run(record.windowStartUtc, record.resourceId);
    });

    const upsert = this.db.prepare(
      `INSERT INTO allocated_records(
         partition_path, window_start_utc, resource_id, device_id, store_number, allocated_cost, allocation_method, run_id, record_json
       ) VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(window_start_utc, resource_id, device_id, store_number) DO UPDATE SET
         allocated_cost=excluded.allocated_cost,
         allocation_method=excluded.allocation_method,
         run_id=excluded.run_id,
         record_json=excluded.record_json`
    );
    records.forEach((record) => {
      upsert.run(
        partitionPathOf(record.windowStartUtc),
        record.windowStartUtc,
        record.resourceId,
        record.deviceId,
        record.storeNumber,
        record.allocatedCost,
        record.allocationMethod,
        runId,
        JSON.stringify(record)
      );
    });
  }
}

export interface SqliteAllocationBundle {
  store: SqliteAllocationStore;
  close: () => void;
}

export function createSqliteAllocationStore(filePath: string): SqliteAllocationBundle {
  const context: SqliteContext = createSqliteContext(filePath);
  applySqliteMigrations(context.db);
  return { store: new SqliteAllocationStore(context.db), close: context.close };
}
