import type { AppError } from './types.js';

type AppErrorFields = Pick<AppError, 'statusCode' | 'code' | 'details' | 'recoverable' | 'context'>;

export function createAppError(message: string, fields: AppErrorFields): AppError {
  return Object.assign(new Error(message), fields);
}

export type SourceErrorKind = 'permission' | 'transient' | 'throttled';

export class SourceError extends Error {
  constructor(
    public readonly kind: SourceErrorKind,
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'SourceError';
  }
}

export function isSourceError(error: unknown): error is SourceError {
  return error instanceof SourceError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
