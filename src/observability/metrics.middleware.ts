import { Request, Response, NextFunction } from 'express';

import { httpRequestDuration, httpRequestsTotal } from './metrics';

const UUID_SEGMENT = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const NUMERIC_SEGMENT = /^\d+$/;
// course-v1:Org+Course+Run, Org+Course and similar catalog keys
const CONTENT_KEY_SEGMENT = /(:|\+|%2B|%3A)/i;

const normalizeSegment = (segment: string): string => {
  if (UUID_SEGMENT.test(segment) || NUMERIC_SEGMENT.test(segment)) return ':id';
  if (CONTENT_KEY_SEGMENT.test(segment)) return ':contentKey';
  return segment;
};

/**
 * Label for requests no route matched; ids and content keys are collapsed so
 * probing unknown paths cannot grow the label set
 */
export const normalizePath = (path: string): string => path.split('/').map(normalizeSegment).join('/');

const routeLabel = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  return typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : normalizePath(req.path);
};

export const metricsMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  if (req.path === '/metrics') {
    next();
    return;
  }

  const endTimer = httpRequestDuration.startTimer();

  res.on('finish', () => {
    const labels = { method: req.method, path: routeLabel(req), status: String(res.statusCode) };
    httpRequestsTotal.inc(labels);
    endTimer(labels);
  });

  next();
};
