import type { TelemetryEvent, TimeRange } from '../../shared/costAllocation.js';
import { collectBatch, type CollectionResult, type CollectorOptions } from './collectBatch.js';
import type { TelemetrySource } from './interfaces.js';
import { parseTelemetryRecords } from './recordParsing.js';

export class TelemetryCollector {
  constructor(
    private readonly source: TelemetrySource,
    private readonly options: CollectorOptions
  ) {}

  collect(range: TimeRange): Promise<CollectionResult<TelemetryEvent>> {
    return collectBatch(
      {
        source: `telemetry:${this.source.name}`,
        range,
        fetch: () => this.source.fetchTelemetry(range),
        parse: parseTelemetryRecords
      },
      this.options
    );
  }
}
