import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

import { runWithContext } from './log-context';
import { logger } from './logger';

/**
 * Inbound headers that may already carry an id, in order of preference
 */
const INBOUND_ID_HEADERS = ['x-correlation-id', 'x-request-id'] as const;

const CORRELATION_HEADER = 'x-correlation-id';

const inboundCorrelationId = (req: Request): string | undefined => {
  for (const header of INBOUND_ID_HEADERS) {
    const raw = req.headers[header];
    const value = Array.isArray(raw) ? raw[0] : raw;
    if (value) return value;
  }
  return undefined;
};

/**
 * Runs the rest of the request inside a log context keyed by a correlation
 * id, taken from the caller when it sent one. The id is echoed back so
 * callers can match their logs to ours.
 */
export const correlationMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const correlationId = inboundCorrelationId(req) ?? uuid();
  const startedAt = Date.now();

  res.setHeader(CORRELATION_HEADER, correlationId);

  runWithContext({ correlationId }, () => {
    logger.debug({ method: req.method, path: req.path }, 'Request started');

    // 'finish' can fire outside the async context, so the id is passed explicitly
    res.on('finish', () => {
      const fields = {
        correlationId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt,
      };
      if (res.statusCode >= 500) {
        logger.warn(fields, 'Request failed');
      } else {
        logger.info(fields, 'Request completed');
      }
    });

    next();
  });
};
