import { z } from 'zod';
import { UNKNOWN_ATTRIBUTION, type CostEvent, type TelemetryEvent } from '../../shared/costAllocation.js';
import { normalizeAttribution } from '../engine/normalizer.js';
import { logger } from '../observability/logger.js';
import { metricsRegistry } from '../observability/metrics.js';

type Stream = 'telemetry' | 'cost';
type RawRecord = Record<string, unknown>;

const rawRecordSchema = z.record(z.unknown());
const NAIVE_DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

function compactDate(digits: string): string | null {
  const match = COMPACT_DATE.exec(digits);
  return match ? `${match[1]}-${match[2]}-${match[3]}T00:00:00.000Z` : null;
}

// Timestamps without an offset are UTC; 8-digit dates are YYYYMMDD, not epoch milliseconds.
function utcTimestampInput(value: unknown): unknown {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? (compactDate(String(value)) ?? value) : value;
  }
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  if (NAIVE_DATE_TIME.test(trimmed)) {
    return `${trimmed.replace(' ', 'T')}Z`;
  }
  return compactDate(trimmed) ?? trimmed;
}

const timestampSchema = z.preprocess(
  utcTimestampInput,
  z.union([z.string().min(1), z.number(), z.date()]).pipe(z.coerce.date())
);
const numericSchema = z.coerce.number().finite();

export interface ParseOutcome<T> {
  records: T[];
  rejected: number;
  malformed: Record<string, number>;
}

class FieldReader {
  readonly malformed: Record<string, number> = {};

  constructor(private readonly record: RawRecord) {}

  raw(aliases: string[]): unknown {
    const key = aliases.find((alias) => this.record[alias] !== undefined);
    return key === undefined ? undefined : this.record[key];
  }

  timestamp(aliases: string[]): string | null {
    const parsed = timestampSchema.safeParse(this.raw(aliases));
    return parsed.success && !Number.isNaN(parsed.data.getTime()) ? parsed.data.toISOString() : null;
  }

  /** Unparseable values coerce to 0 and negatives clamp to 0; both are counted. Absent fields are 0. */
  nonNegative(field: string, aliases: string[]): number {
    const value = this.raw(aliases);
    if (value === undefined || value === null || value === '') {
      return 0;
    }
    const parsed = numericSchema.safeParse(value);
    if (!parsed.success || parsed.data < 0) {
      this.flag(field);
      return 0;
    }
    return parsed.data;
  }

  attribution(field: string, aliases: string[]): string {
    const value = this.raw(aliases);
    const normalized = normalizeAttribution(value);
    if (normalized === UNKNOWN_ATTRIBUTION && value !== UNKNOWN_ATTRIBUTION) {
      this.flag(field);
    }
    return normalized;
  }

  text(aliases: string[], fallback: string): string {
    const value = this.raw(aliases);
    const trimmed = typeof value === 'string' ? value.trim() : '';
    return trimmed || fallback;
  }

  private flag(field: string): void {
    this.malformed[field] = (this.malformed[field] ?? 0) + 1;
  }
}

function parseBatch<T>(stream: Stream, rawRecords: unknown[], parseOne: (reader: FieldReader) => T | null): ParseOutcome<T> {
  const outcome: ParseOutcome<T> = { records: [], rejected: 0, malformed: {} };

  rawRecords.forEach((rawRecord) => {
    const shape = rawRecordSchema.safeParse(rawRecord);
    if (!shape.success) {
      outcome.rejected += 1;
      return;
    }

    const reader = new FieldReader(shape.data);
    const parsed = parseOne(reader);
    Object.entries(reader.malformed).forEach(([field, count]) => {
      outcome.malformed[field] = (outcome.malformed[field] ?? 0) + count;
    });
    if (parsed === null) {
      outcome.rejected += 1;
      return;
    }
    outcome.records.push(parsed);
  });

  Object.entries(outcome.malformed).forEach(([field, count]) => {
    metricsRegistry.incrementMalformedField(`${stream}.${field}`, count);
  });
  if (outcome.rejected) {
    metricsRegistry.incrementRejectedRecords(stream, outcome.rejected);
    logger.warn('records_rejected', { stream, rejected: outcome.rejected, received: rawRecords.length });
  }

  return outcome;
}

export function parseTelemetryRecords(rawRecords: unknown[]): ParseOutcome<TelemetryEvent> {
  return parseBatch('telemetry', rawRecords, (reader) => {
    const timestamp = reader.timestamp(['timestamp', 'TimeGenerated']);
    if (!timestamp) {
      return null;
    }
    return {
      timestamp,
      deviceId: reader.attribution('deviceId', ['deviceId', 'DeviceId']),
      storeNumber: reader.attribution('storeNumber', ['storeNumber', 'StoreNumber']),
      resourceId: reader.text(['resourceId', 'ResourceId'], UNKNOWN_ATTRIBUTION),
      tokensUsed: reader.nonNegative('tokensUsed', ['tokensUsed', 'TokensUsed']),
      statusCode: reader.nonNegative('statusCode', ['statusCode', 'StatusCode']),
      responseTimeMs: reader.nonNegative('responseTimeMs', ['responseTimeMs', 'ResponseTime'])
    };
  });
}

export function parseCostRecords(rawRecords: unknown[]): ParseOutcome<CostEvent> {
  return parseBatch('cost', rawRecords, (reader) => {
    const usageTimestamp = reader.timestamp(['usageTimestamp', 'UsageDate']);
    if (!usageTimestamp) {
      return null;
    }
    return {
      resourceId: reader.text(['resourceId', 'ResourceId'], UNKNOWN_ATTRIBUTION),
      usageTimestamp,
      cost: reader.nonNegative('cost', ['cost', 'Cost', 'totalCost']),
      usageQuantity: reader.nonNegative('usageQuantity', ['usageQuantity', 'UsageQuantity']),
      currency: reader.text(['currency', 'Currency'], 'USD'),
      meterName: reader.text(['meterName', 'MeterName', 'Meter'], 'Unknown'),
      serviceName: reader.text(['serviceName', 'ServiceName'], 'Unknown')
    };
  });
}
