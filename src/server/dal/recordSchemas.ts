import { z } from 'zod';
import { ALLOCATION_METHODS } from '../../shared/costAllocation.js';

const allocationMethodSchema = z.enum(ALLOCATION_METHODS);

export const allocatedRecordSchema = z.object({
  windowStartUtc: z.string(),
  resourceId: z.string(),
  deviceId: z.string(),
  storeNumber: z.string(),
  deviceStoreKey: z.string(),
  allocatedCost: z.number(),
  totalCost: z.number(),
  allocationMethod: allocationMethodSchema,
  tokensUsed: z.number(),
  apiCalls: z.number(),
  avgResponseTimeMs: z.number(),
  tokenShare: z.number(),
  apiCallShare: z.number(),
  costType: z.string(),
  modelFamily: z.string(),
  meterName: z.string(),
  currency: z.string(),
  isUnknownDevice: z.boolean(),
  isUnknownStore: z.boolean(),
  hasCompleteAttribution: z.boolean(),
  costPerToken: z.number(),
  costPerApiCall: z.number(),
  hour: z.number().int(),
  dayOfWeek: z.string(),
  isBusinessHours: z.boolean(),
  isWeekday: z.boolean(),
  shiftCategory: z.enum(['Morning', 'Evening', 'Night']),
  confidence: z.number(),
  accuracy: z.number(),
  utilization: z.number()
});

export const allocationRunRowSchema = z
  .object({
    run_id: z.string(),
    started_at_utc: z.string(),
    completed_at_utc: z.string().nullable(),
    status: z.enum(['ok', 'skipped', 'error']),
    allocation_method: allocationMethodSchema,
    telemetry_count: z.number(),
    cost_count: z.number(),
    allocated_count: z.number(),
    total_cost: z.number(),
    allocated_cost: z.number(),
    conservation_violations: z.number(),
    rejected_records: z.number(),
    error_message: z.string().nullable()
  })
  .transform((row) => ({
    runId: row.run_id,
    startedAtUtc: row.started_at_utc,
    completedAtUtc: row.completed_at_utc,
    status: row.status,
    allocationMethod: row.allocation_method,
    telemetryCount: row.telemetry_count,
    costCount: row.cost_count,
    allocatedCount: row.allocated_count,
    totalCost: row.total_cost,
    allocatedCost: row.allocated_cost,
    conservationViolations: row.conservation_violations,
    rejectedRecords: row.rejected_records,
    errorMessage: row.error_message
  }));

export const rawTelemetryRowSchema = z
  .object({
    timestamp_utc: z.string(),
    device_id: z.string(),
    store_number: z.string(),
    resource_id: z.string(),
    tokens_used: z.number(),
    status_code: z.number(),
    response_time_ms: z.number()
  })
  .transform((row) => ({
    timestamp: row.timestamp_utc,
    deviceId: row.device_id,
    storeNumber: row.store_number,
    resourceId: row.resource_id,
    tokensUsed: row.tokens_used,
    statusCode: row.status_code,
    responseTimeMs: row.response_time_ms
  }));

export const rawCostRowSchema = z
  .object({
    resource_id: z.string(),
    usage_timestamp_utc: z.string(),
    meter_name: z.string(),
    cost: z.number(),
    usage_quantity: z.number(),
    currency: z.string(),
    service_name: z.string()
  })
  .transform((row) => ({
    resourceId: row.resource_id,
    usageTimestamp: row.usage_timestamp_utc,
    cost: row.cost,
    usageQuantity: row.usage_quantity,
    currency: row.currency,
    meterName: row.meter_name,
    serviceName: row.service_name
  }));

export const recordJsonRowSchema = z.object({ record_json: z.string() });
