import type { AllocatedRecord, CostPrediction, TelemetryEvent } from '../../shared/costAllocation.js';
import { logger } from '../observability/logger.js';
import { mean, pearson, sampleStd } from './statistics.js';
import { groupByDeviceStore } from './usagePatterns.js';

const PREDICTOR_THRESHOLD = 0.5;

export interface DeviceCostModel {
  tokenCorrelation: number;
  callCorrelation: number;
  avgCostPerToken: number;
  avgCostPerCall: number;
  historicalAverage: number;
}

function orZero(value: number): number {
  return Number.isNaN(value) ? 0 : value;
}

export function buildCostModels(history: AllocatedRecord[], minHistoryPoints: number): Map<string, DeviceCostModel> {
  const models = new Map<string, DeviceCostModel>();

  groupByDeviceStore(history).forEach((records, key) => {
    if (records.length < minHistoryPoints) {
      return;
    }
    const costs = records.map((record) => record.allocatedCost);
    if (sampleStd(costs) <= 0) {
      return;
    }

    const tokens = records.map((record) => record.tokensUsed);
    const calls = records.map((record) => record.apiCalls);
    const totalCost = costs.reduce((sum, cost) => sum + cost, 0);

    models.set(key, {
      tokenCorrelation: orZero(pearson(tokens, costs)),
      callCorrelation: orZero(pearson(calls, costs)),
      avgCostPerToken: totalCost / Math.max(tokens.reduce((sum, value) => sum + value, 0), 1),
      avgCostPerCall: totalCost / Math.max(calls.reduce((sum, value) => sum + value, 0), 1),
      historicalAverage: mean(costs)
    });
  });

  return models;
}

export function predictCost(model: DeviceCostModel, totalTokens: number, totalCalls: number): Omit<CostPrediction, 'deviceId' | 'storeNumber'> {
  if (model.tokenCorrelation > PREDICTOR_THRESHOLD) {
    return { predictedCost: Math.max(totalTokens * model.avgCostPerToken, 0), basis: 'tokens' };
  }
  if (model.callCorrelation > PREDICTOR_THRESHOLD) {
    return { predictedCost: Math.max(totalCalls * model.avgCostPerCall, 0), basis: 'calls' };
  }
  return { predictedCost: Math.max(model.historicalAverage, 0), basis: 'historical-average' };
}

export function predictCosts(
  history: AllocatedRecord[],
  current: TelemetryEvent[],
  { minHistoryPoints }: { minHistoryPoints: number }
): CostPrediction[] {
  if (!history.length || !current.length) {
    return [];
  }

  const models = buildCostModels(history, minHistoryPoints);
  const predictions: CostPrediction[] = [];

  groupByDeviceStore(current).forEach((events, key) => {
    const model = models.get(key);
    const first = events[0];
    if (!model || !first) {
      return;
    }
    const totalTokens = events.reduce((sum, event) => sum + event.tokensUsed, 0);
    predictions.push({
      deviceId: first.deviceId,
      storeNumber: first.storeNumber,
      ...predictCost(model, totalTokens, events.length)
    });
  });

  logger.info('cost_predictions_complete', { models: models.size, predictions: predictions.length });
  return predictions;
}
