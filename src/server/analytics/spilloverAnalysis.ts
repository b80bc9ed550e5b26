import type { AllocatedRecord, SpilloverPair, SpilloverReport } from '../../shared/costAllocation.js';
import { logger } from '../observability/logger.js';
import { mean, pearson } from './statistics.js';

function costSeries(records: AllocatedRecord[], windows: string[]): number[] {
  const byWindow = new Map<string, number>();
  records.forEach((record) => {
    byWindow.set(record.windowStartUtc, (byWindow.get(record.windowStartUtc) ?? 0) + record.allocatedCost);
  });
  return windows.map((window) => byWindow.get(window) ?? 0);
}

function storeReport(storeNumber: string, records: AllocatedRecord[], threshold: number): SpilloverReport | null {
  const devices = [...new Set(records.map((record) => record.deviceId))].sort();
  const windows = [...new Set(records.map((record) => record.windowStartUtc))].sort();
  if (devices.length < 2 || windows.length < 2) {
    return null;
  }

  const series = new Map(
    devices.map((deviceId) => [deviceId, costSeries(records.filter((record) => record.deviceId === deviceId), windows)])
  );

  const pairs: SpilloverPair[] = [];
  devices.forEach((deviceA, index) => {
    devices.slice(index + 1).forEach((deviceB) => {
      const correlation = pearson(series.get(deviceA) ?? [], series.get(deviceB) ?? []);
      if (Number.isNaN(correlation) || Math.abs(correlation) <= threshold) {
        return;
      }
      pairs.push({ deviceA, deviceB, correlation, relationship: correlation > 0 ? 'positive' : 'negative' });
    });
  });

  if (!pairs.length) {
    return null;
  }

  const deviceTotals = [...series.values()].map((values) => values.reduce((sum, value) => sum + value, 0));
  return {
    storeNumber,
    deviceCount: devices.length,
    pairs,
    totalStoreCost: records.reduce((sum, record) => sum + record.allocatedCost, 0),
    avgDeviceCost: mean(deviceTotals)
  };
}

/** Stores whose devices' allocated cost moves together (or in opposition) across windows. */
export function analyzeSpillover(
  records: AllocatedRecord[],
  { correlationThreshold }: { correlationThreshold: number }
): SpilloverReport[] {
  const byStore = new Map<string, AllocatedRecord[]>();
  records.forEach((record) => {
    byStore.set(record.storeNumber, [...(byStore.get(record.storeNumber) ?? []), record]);
  });

  const reports = [...byStore.entries()]
    .flatMap(([storeNumber, storeRecords]) => {
      const report = storeReport(storeNumber, storeRecords, correlationThreshold);
      return report ? [report] : [];
    })
    .sort((left, right) => left.storeNumber.localeCompare(right.storeNumber));

  logger.info('spillover_analysis_complete', { stores: byStore.size, reports: reports.length });
  return reports;
}
