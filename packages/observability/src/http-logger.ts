import type { Request, Response, NextFunction } from 'express';
import { createLogger } from './logger';

const log = createLogger('http');

// Probes hit every few seconds; keep them out of the info stream
const PROBE_PATHS = new Set(['/health', '/ready']);

export function httpLoggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on('finish', () => {
    const entry = {
      method: req.method,
      url: req.originalUrl,
      status: res.statusCode,
      ms: Date.now() - start,
      requestId: req.requestId,
    };
    if (res.statusCode >= 500) log.error(entry, 'Request failed');
    else if (PROBE_PATHS.has(req.path)) log.debug(entry, 'Probe served');
    else log.info(entry, 'Request completed');
  });
  next();
}
