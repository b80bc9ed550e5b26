import type {
  AllocatedRecord,
  AllocationMethod,
  ConservationCheck,
  CostEvent,
  TelemetryEvent
} from '../../shared/costAllocation.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.js';
import { logger } from '../observability/logger.js';
import { metricsRegistry } from '../observability/metrics.js';
import { allocate, checkGroupConservation } from './allocator.js';
import { correlate } from './correlator.js';
import { enrich } from './enricher.js';
import { aggregateTelemetry, windowCosts } from './windower.js';

export interface EngineResult {
  allocationMethod: AllocationMethod;
  records: AllocatedRecord[];
  conservation: ConservationCheck[];
  violations: ConservationCheck[];
  totals: {
    groups: number;
    totalCost: number;
    allocatedCost: number;
  };
}

/**
 * Stateless batch transform: telemetry and cost events in, enriched per device/store
 * allocations out. Identical inputs always produce identical results.
 */
export class AllocationEngine {
  constructor(private readonly config: EngineConfig = DEFAULT_ENGINE_CONFIG) {}

  get defaultMethod(): AllocationMethod {
    return this.config.allocationMethod;
  }

  run(telemetry: TelemetryEvent[], costs: CostEvent[], method = this.config.allocationMethod): EngineResult {
    const aggregates = aggregateTelemetry(telemetry, this.config.windowMinutes);
    const costWindows = windowCosts(costs, this.config.windowMinutes);
    const groups = correlate(aggregates, costWindows);

    const records: AllocatedRecord[] = [];
    const conservation: ConservationCheck[] = [];

    groups.forEach((group) => {
      const drafts = allocate(group, method);
      conservation.push(checkGroupConservation(group, drafts, this.config.conservationTolerance));
      drafts.forEach((draft) => records.push(enrich(draft, method)));
    });

    const violations = conservation.filter((check) => !check.valid);
    if (violations.length) {
      metricsRegistry.incrementConservationViolation(violations.length);
      violations.forEach((violation) => {
        logger.warn('conservation_violation', {
          windowStartUtc: violation.windowStartUtc,
          resourceId: violation.resourceId,
          totalCost: violation.totalCost,
          allocatedCost: violation.allocatedCost,
          variance: violation.variance,
          allocationMethod: method
        });
      });
    }

    const totals = {
      groups: groups.length,
      totalCost: conservation.reduce((sum, check) => sum + check.totalCost, 0),
      allocatedCost: records.reduce((sum, record) => sum + record.allocatedCost, 0)
    };

    logger.info('allocation_complete', {
      allocationMethod: method,
      telemetryEvents: telemetry.length,
      costEvents: costs.length,
      telemetryAggregates: aggregates.length,
      costWindows: costWindows.length,
      ...totals,
      records: records.length,
      conservationViolations: violations.length
    });

    return { allocationMethod: method, records, conservation, violations, totals };
  }
}
