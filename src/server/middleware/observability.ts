import type { NextFunction, Request, Response } from 'express';
import { logger } from '../observability/logger.js';
import { metricsRegistry } from '../observability/metrics.js';

function routeLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  return typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : req.path;
}

export function observabilityMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    const route = routeLabel(req);

    metricsRegistry.recordApiRequestDuration({
      route,
      method: req.method,
      status: res.statusCode,
      durationMs
    });

    logger.info('api_request', {
      requestId: req.requestId,
      method: req.method,
      route,
      path: req.originalUrl,
      statusCode: res.statusCode,
      api_request_duration_ms: Number(durationMs.toFixed(2))
    });
  });

  next();
}
