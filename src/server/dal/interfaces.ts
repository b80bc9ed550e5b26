import type {
  AllocatedRecord,
  AllocationRun,
  CostEvent,
  TelemetryEvent,
  TimeRange
} from '../../shared/costAllocation.js';

export interface AllocationBatch {
  run: AllocationRun;
  records: AllocatedRecord[];
  telemetry: TelemetryEvent[];
  costs: CostEvent[];
}

export interface AllocationQuery {
  /** YYYY-MM-DD, matched against the window start date (UTC). */
  date?: string;
  deviceId?: string;
  storeNumber?: string;
  resourceId?: string;
  start?: string;
  end?: string;
}

/** One logical write per run: records, raw inputs and the run row land together or not at all. */
export interface AllocationSink {
  writeRun(batch: AllocationBatch): Promise<void>;
}

export interface AllocationRepository extends AllocationSink {
  /** Records a run that produced no batch (skipped or failed). */
  saveRun(run: AllocationRun): Promise<void>;
  listRuns(limit: number): Promise<AllocationRun[]>;
  getLatestRun(): Promise<AllocationRun | null>;
  getAllocations(query: AllocationQuery): Promise<AllocatedRecord[]>;
  getTelemetry(range: TimeRange): Promise<TelemetryEvent[]>;
  getCosts(range: TimeRange): Promise<CostEvent[]>;
  checkHealth(): Promise<{ ok: boolean; backend: 'memory' | 'sqlite' }>;
}

export function partitionPathOf(windowStartUtc: string): string {
  return windowStartUtc.slice(0, 10).replaceAll('-', '/');
}
