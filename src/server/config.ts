import { z } from 'zod';
import { ALLOCATION_METHODS, type AllocationMethod } from '../shared/costAllocation.js';
import { createAppError } from './errors.js';
import type { LogLevel } from './observability/logger.js';

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .optional()
    .default(fallback)
    .transform((value) => value === 'true');

const positiveNumber = (fallback: number) => z.coerce.number().positive().optional().default(fallback);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).optional().default(3001),
  HOST: z.string().trim().min(1).optional().default('0.0.0.0'),
  PERSISTENCE_BACKEND: z.enum(['memory', 'sqlite']).optional().default('memory'),
  SQLITE_PATH: z.string().trim().min(1).optional().default('/tmp/store-cost-attribution.sqlite'),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['debug', 'info', 'warn', 'error']))
    .optional()
    .default('info'),
  ALLOCATION_METHOD: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(ALLOCATION_METHODS))
    .optional()
    .default('proportional'),
  TIME_WINDOW_MINUTES: z.coerce.number().int().positive().optional().default(60),
  LOOKBACK_HOURS: positiveNumber(1),
  COLLECTION_INTERVAL_MINUTES: positiveNumber(6),
  MAX_RETRY_ATTEMPTS: z.coerce.number().int().min(0).optional().default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).optional().default(1000),
  CONSERVATION_TOLERANCE: z.coerce.number().min(0).max(1).optional().default(0.01),
  DECAY_HOURS: positiveNumber(2),
  PATTERN_LOOKBACK_DAYS: positiveNumber(7),
  ANOMALY_DEVIATION_THRESHOLD: positiveNumber(2),
  ANOMALY_HIGH_SEVERITY_THRESHOLD: positiveNumber(5),
  SPILLOVER_CORRELATION_THRESHOLD: z.coerce.number().min(0).max(1).optional().default(0.7),
  PREDICTION_MIN_HISTORY: z.coerce.number().int().min(2).optional().default(5),
  SCHEDULER_ENABLED: booleanFlag('true'),
  SCHEDULER_RUN_ON_STARTUP: booleanFlag('false'),
  SEED_DEMO_DATA: booleanFlag('true')
});

export interface EngineConfig {
  readonly windowMinutes: number;
  readonly allocationMethod: AllocationMethod;
  readonly conservationTolerance: number;
}

export interface AnalyticsConfig {
  readonly decayHours: number;
  readonly patternLookbackDays: number;
  readonly anomalyDeviationThreshold: number;
  readonly anomalyHighSeverityThreshold: number;
  readonly spilloverCorrelationThreshold: number;
  readonly predictionMinHistory: number;
}

export interface CollectionConfig {
  readonly lookbackHours: number;
  readonly intervalMinutes: number;
  readonly maxRetryAttempts: number;
  readonly retryBaseDelayMs: number;
  readonly schedulerEnabled: boolean;
  readonly runOnStartup: boolean;
  readonly seedDemoData: boolean;
}

export interface AppConfig {
  readonly server: { readonly port: number; readonly host: string };
  readonly persistence: { readonly backend: 'memory' | 'sqlite'; readonly sqlitePath: string };
  readonly logLevel: LogLevel;
  readonly collection: CollectionConfig;
  readonly engine: EngineConfig;
  readonly analytics: AnalyticsConfig;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  windowMinutes: 60,
  allocationMethod: 'proportional',
  conservationTolerance: 0.01
});

export const DEFAULT_ANALYTICS_CONFIG: AnalyticsConfig = Object.freeze({
  decayHours: 2,
  patternLookbackDays: 7,
  anomalyDeviationThreshold: 2,
  anomalyHighSeverityThreshold: 5,
  spilloverCorrelationThreshold: 0.7,
  predictionMinHistory: 5
});

function deepFreeze<T extends object>(value: T): Readonly<T> {
  Object.values(value).forEach((child: unknown) => {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  });
  return Object.freeze(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw createAppError('Invalid configuration', {
      code: 'CONFIG_INVALID',
      recoverable: false,
      details: parsed.error.issues
    });
  }

  const values = parsed.data;

  return deepFreeze({
    server: { port: values.PORT, host: values.HOST },
    persistence: { backend: values.PERSISTENCE_BACKEND, sqlitePath: values.SQLITE_PATH },
    logLevel: values.LOG_LEVEL,
    collection: {
      lookbackHours: values.LOOKBACK_HOURS,
      intervalMinutes: values.COLLECTION_INTERVAL_MINUTES,
      maxRetryAttempts: values.MAX_RETRY_ATTEMPTS,
      retryBaseDelayMs: values.RETRY_BASE_DELAY_MS,
      schedulerEnabled: values.SCHEDULER_ENABLED,
      runOnStartup: values.SCHEDULER_RUN_ON_STARTUP,
      seedDemoData: values.SEED_DEMO_DATA
    },
    engine: {
      windowMinutes: values.TIME_WINDOW_MINUTES,
      allocationMethod: values.ALLOCATION_METHOD,
      conservationTolerance: values.CONSERVATION_TOLERANCE
    },
    analytics: {
      decayHours: values.DECAY_HOURS,
      patternLookbackDays: values.PATTERN_LOOKBACK_DAYS,
      anomalyDeviationThreshold: values.ANOMALY_DEVIATION_THRESHOLD,
      anomalyHighSeverityThreshold: values.ANOMALY_HIGH_SEVERITY_THRESHOLD,
      spilloverCorrelationThreshold: values.SPILLOVER_CORRELATION_THRESHOLD,
      predictionMinHistory: values.PREDICTION_MIN_HISTORY
    }
  });
}
