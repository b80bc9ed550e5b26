import type { TimeRange } from '../../shared/costAllocation.js';

export interface SourceBatch {
  records: unknown[];
  partialError?: string;
}

export interface TelemetrySource {
  readonly name: string;
  fetchTelemetry(range: TimeRange): Promise<SourceBatch>;
}

export interface CostSource {
  readonly name: string;
  fetchCosts(range: TimeRange): Promise<SourceBatch>;
}
