import type { TimeRange } from '../../shared/costAllocation.js';
import { errorMessage, isSourceError } from '../errors.js';
import { logger } from '../observability/logger.js';
import { metricsRegistry } from '../observability/metrics.js';
import type { SourceBatch } from './interfaces.js';
import type { ParseOutcome } from './recordParsing.js';
import { withRetry } from './retry.js';

export type CollectionStatus = 'ok' | 'degraded' | 'throttled';

export interface CollectionResult<T> {
  events: T[];
  received: number;
  rejected: number;
  status: CollectionStatus;
}

export interface CollectorOptions {
  maxRetryAttempts: number;
  retryBaseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

interface BatchRequest<T> {
  source: string;
  range: TimeRange;
  fetch: () => Promise<SourceBatch>;
  parse: (records: unknown[]) => ParseOutcome<T>;
}

function emptyResult<T>(status: CollectionStatus): CollectionResult<T> {
  return { events: [], received: 0, rejected: 0, status };
}

/**
 * Fetches one batch with bounded retry. Transient failures degrade to an empty batch,
 * throttling yields an empty batch flagged `throttled`, anything else is rethrown.
 */
export async function collectBatch<T>(request: BatchRequest<T>, options: CollectorOptions): Promise<CollectionResult<T>> {
  const { source, range } = request;

  let batch: SourceBatch;
  try {
    batch = await withRetry(request.fetch, {
      label: source,
      maxAttempts: options.maxRetryAttempts,
      baseDelayMs: options.retryBaseDelayMs,
      sleep: options.sleep
    });
  } catch (error) {
    metricsRegistry.incrementSourceFailure(source);

    if (isSourceError(error) && error.kind === 'throttled') {
      logger.warn('source_throttled', { source, statusCode: error.statusCode, ...range });
      return emptyResult('throttled');
    }
    if (isSourceError(error) && error.kind === 'transient') {
      logger.warn('source_degraded', { source, error: error.message, ...range });
      return emptyResult('degraded');
    }

    logger.error('source_failed', { source, error: errorMessage(error), ...range });
    throw error;
  }

  if (batch.partialError) {
    logger.warn('source_partial_result', { source, partialError: batch.partialError, records: batch.records.length });
  }

  const parsed = request.parse(batch.records);
  logger.info('source_collected', {
    source,
    received: batch.records.length,
    accepted: parsed.records.length,
    rejected: parsed.rejected,
    ...range
  });

  return { events: parsed.records, received: batch.records.length, rejected: parsed.rejected, status: 'ok' };
}
