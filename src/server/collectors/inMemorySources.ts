import type { TimeRange } from '../../shared/costAllocation.js';
import { HOUR_MS, toMillis } from '../engine/windower.js';
import type { CostSource, SourceBatch, TelemetrySource } from './interfaces.js';

type RawRecord = Record<string, unknown>;

function timestampOf(record: RawRecord, fields: string[]): number {
  const field = fields.find((candidate) => typeof record[candidate] === 'string');
  const value = field ? record[field] : undefined;
  return typeof value === 'string' ? Date.parse(value) : Number.NaN;
}

// Records whose timestamp cannot be read are always handed through so parsing can count them.
function inRange(records: RawRecord[], range: TimeRange, fields: string[]): RawRecord[] {
  const startMs = toMillis(range.start);
  const endMs = toMillis(range.end);
  return records.filter((record) => {
    const timestampMs = timestampOf(record, fields);
    return Number.isNaN(timestampMs) || (timestampMs >= startMs && timestampMs < endMs);
  });
}

export class StaticTelemetrySource implements TelemetrySource {
  readonly name = 'static';

  constructor(private readonly records: RawRecord[] = []) {}

  push(...records: RawRecord[]): void {
    this.records.push(...records);
  }

  async fetchTelemetry(range: TimeRange): Promise<SourceBatch> {
    return { records: inRange(this.records, range, ['timestamp', 'TimeGenerated']) };
  }
}

export class StaticCostSource implements CostSource {
  readonly name = 'static';

  constructor(private readonly records: RawRecord[] = []) {}

  push(...records: RawRecord[]): void {
    this.records.push(...records);
  }

  async fetchCosts(range: TimeRange): Promise<SourceBatch> {
    return { records: inRange(this.records, range, ['usageTimestamp', 'UsageDate']) };
  }
}

const DEMO_RESOURCE_PATH =
  '/subscriptions/demo-subscription/resourceGroups/retail-ai/providers/Microsoft.CognitiveServices/accounts/retail-openai-east';
const DEMO_ENDPOINT = 'https://retail-openai-east.openai.azure.com/openai/deployments/gpt-4o/chat/completions';
const DEMO_COST_PER_TOKEN = 0.00001;

const DEMO_DEVICES: Array<[deviceId: string | null, storeNumber: string | null]> = [
  ['pos-01', 'store-101'],
  ['pos-02', 'store-101'],
  ['kiosk-01', 'store-101'],
  ['pos-01', 'store-202'],
  ['kiosk-02', 'store-202'],
  [null, 'store-303'],
  ['handheld-07', null]
];

// mulberry32
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

interface DemoHour {
  telemetry: RawRecord[];
  cost: RawRecord;
}

function demoHour(hourStartMs: number): DemoHour {
  const random = seededRandom(hourStartMs / HOUR_MS);
  const telemetry: RawRecord[] = [];
  let hourTokens = 0;

  DEMO_DEVICES.forEach(([deviceId, storeNumber]) => {
    const calls = 1 + Math.floor(random() * 4);
    for (let call = 0; call < calls; call += 1) {
      const tokensUsed = 200 + Math.floor(random() * 1200);
      hourTokens += tokensUsed;
      telemetry.push({
        timestamp: new Date(hourStartMs + Math.floor(((call + random()) * HOUR_MS) / calls)).toISOString(),
        deviceId,
        storeNumber,
        resourceId: DEMO_ENDPOINT,
        tokensUsed,
        statusCode: random() > 0.95 ? 429 : 200,
        responseTimeMs: 150 + Math.floor(random() * 900)
      });
    }
  });

  return {
    telemetry,
    cost: {
      resourceId: DEMO_RESOURCE_PATH.toUpperCase(),
      usageTimestamp: new Date(hourStartMs).toISOString(),
      cost: Number((hourTokens * DEMO_COST_PER_TOKEN).toFixed(6)),
      usageQuantity: hourTokens / 1000,
      currency: 'USD',
      meterName: 'gpt-4o input tokens',
      serviceName: 'Cognitive Services'
    }
  };
}

function demoHours(range: TimeRange): DemoHour[] {
  const startMs = Math.floor(toMillis(range.start) / HOUR_MS) * HOUR_MS;
  const endMs = toMillis(range.end);
  const hours: DemoHour[] = [];
  for (let hourStartMs = startMs; hourStartMs < endMs; hourStartMs += HOUR_MS) {
    hours.push(demoHour(hourStartMs));
  }
  return hours;
}

/**
 * Synthetic retail traffic for local runs. Output depends only on the requested range,
 * so repeated fetches of one range return identical batches.
 */
export class DemoTelemetrySource implements TelemetrySource {
  readonly name = 'demo';

  async fetchTelemetry(range: TimeRange): Promise<SourceBatch> {
    const records = demoHours(range).flatMap((hour) => hour.telemetry);
    return { records: inRange(records, range, ['timestamp']) };
  }
}

export class DemoCostSource implements CostSource {
  readonly name = 'demo';

  async fetchCosts(range: TimeRange): Promise<SourceBatch> {
    const records = demoHours(range).map((hour) => hour.cost);
    return { records: inRange(records, range, ['usageTimestamp']) };
  }
}
