import type { NextFunction, Request, Response } from 'express';
import { z, type ZodTypeAny } from 'zod';
import { createAppError } from '../errors.js';

type RequestShape = {
  body?: ZodTypeAny;
  query?: ZodTypeAny;
  params?: ZodTypeAny;
};

export function validateRequest(shape: RequestShape) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      if (shape.body) {
        req.body = shape.body.parse(req.body ?? {});
      }
      if (shape.query) {
        req.query = shape.query.parse(req.query);
      }
      if (shape.params) {
        req.params = shape.params.parse(req.params);
      }
      next();
    } catch (error) {
      if (error instanceof z.ZodError) {
        next(
          createAppError('Validation failed', {
            statusCode: 422,
            code: 'VALIDATION_ERROR',
            recoverable: true,
            details: error.issues
          })
        );
        return;
      }
      next(error);
    }
  };
}

/** Re-parses an already validated query so handlers get the schema's output type. */
export function parsedQuery<T extends ZodTypeAny>(schema: T, req: Request): z.output<T> {
  return schema.parse(req.query);
}
