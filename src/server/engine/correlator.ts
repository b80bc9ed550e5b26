import type { CostWindowRecord, JoinedGroup, TelemetryAggregate } from '../../shared/costAllocation.js';
import { logger } from '../observability/logger.js';
import { metricsRegistry } from '../observability/metrics.js';
import { groupKey } from './windower.js';

export function correlate(aggregates: TelemetryAggregate[], costs: CostWindowRecord[]): JoinedGroup[] {
  if (!aggregates.length || !costs.length) {
    return [];
  }

  const costsByKey = new Map(costs.map((cost) => [groupKey(cost.windowStartUtc, cost.resourceId), cost]));
  const groups = new Map<string, JoinedGroup>();

  aggregates.forEach((aggregate) => {
    const key = groupKey(aggregate.windowStartUtc, aggregate.resourceId);
    const cost = costsByKey.get(key);
    if (!cost) {
      return;
    }

    const group = groups.get(key) ?? {
      windowStartUtc: cost.windowStartUtc,
      resourceId: cost.resourceId,
      cost,
      members: []
    };
    group.members.push(aggregate);
    groups.set(key, group);
  });

  if (!groups.size) {
    metricsRegistry.incrementUncorrelatedBatch();
    logger.warn('correlation_empty', {
      telemetryAggregates: aggregates.length,
      costWindows: costs.length,
      telemetryResources: [...new Set(aggregates.map((aggregate) => aggregate.resourceId))],
      costResources: [...new Set(costs.map((cost) => cost.resourceId))],
      hint: 'check resource id and time window alignment'
    });
    return [];
  }

  logger.debug('correlation_complete', { groups: groups.size });

  return [...groups.values()].sort(
    (left, right) =>
      left.windowStartUtc.localeCompare(right.windowStartUtc) || left.resourceId.localeCompare(right.resourceId)
  );
}
