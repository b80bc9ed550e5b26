import type { CostEvent, TimeRange } from '../../shared/costAllocation.js';
import { collectBatch, type CollectionResult, type CollectorOptions } from './collectBatch.js';
import type { CostSource } from './interfaces.js';
import { parseCostRecords } from './recordParsing.js';

export class CostCollector {
  constructor(
    private readonly source: CostSource,
    private readonly options: CollectorOptions
  ) {}

  collect(range: TimeRange): Promise<CollectionResult<CostEvent>> {
    return collectBatch(
      {
        source: `cost:${this.source.name}`,
        range,
        fetch: () => this.source.fetchCosts(range),
        parse: parseCostRecords
      },
      this.options
    );
  }
}
