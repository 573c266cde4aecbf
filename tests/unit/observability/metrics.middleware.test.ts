/**
 * HTTP Metrics Middleware Unit Tests
 */

import { EventEmitter } from 'events';
import { Request, Response, NextFunction } from 'express';

const endTimer = jest.fn();

jest.mock('../../../src/observability/metrics', () => ({
  httpRequestsTotal: { inc: jest.fn() },
  httpRequestDuration: { startTimer: jest.fn(() => endTimer) },
}));

import { httpRequestsTotal } from '../../../src/observability/metrics';
import { metricsMiddleware, normalizePath } from '../../../src/observability/metrics.middleware';

describe('HTTP Metrics Middleware', () => {
  describe('normalizePath', () => {
    it('should collapse subsidy ids and content keys', () => {
      expect(
        normalizePath('/api/v1/subsidies/3f2504e0-4f89-41d3-9a0c-0305e82c3301/redemptions/course-v1:edX+DemoX+2024')
      ).toBe('/api/v1/subsidies/:id/redemptions/:contentKey');
    });

    it('should collapse numeric segments and encoded keys', () => {
      expect(normalizePath('/api/v1/learners/42/content/edX%2BDemoX')).toBe('/api/v1/learners/:id/content/:contentKey');
    });

    it('should leave plain paths alone', () => {
      expect(normalizePath('/health/ready')).toBe('/health/ready');
    });
  });

  describe('metricsMiddleware', () => {
    const run = (req: Partial<Request>): EventEmitter & { statusCode: number } => {
      const res = Object.assign(new EventEmitter(), { statusCode: 200 });
      const next: jest.Mock = jest.fn();
      metricsMiddleware(req as Request, res as unknown as Response, next as NextFunction);
      expect(next).toHaveBeenCalledWith();
      return res;
    };

    it('should label by the matched route once the response finishes', () => {
      const res = run({
        method: 'POST',
        path: '/3f2504e0-4f89-41d3-9a0c-0305e82c3301/redemptions',
        baseUrl: '/api/v1/subsidies',
        route: { path: '/:subsidyId/redemptions' },
      });
      res.statusCode = 201;

      expect(httpRequestsTotal.inc).not.toHaveBeenCalled();
      res.emit('finish');

      const labels = { method: 'POST', path: '/api/v1/subsidies/:subsidyId/redemptions', status: '201' };
      expect(httpRequestsTotal.inc).toHaveBeenCalledWith(labels);
      expect(endTimer).toHaveBeenCalledWith(labels);
    });

    it('should fall back to the normalized path for unmatched requests', () => {
      const res = run({ method: 'GET', path: '/api/v1/unknown/77', baseUrl: '' });
      res.statusCode = 404;
      res.emit('finish');

      expect(httpRequestsTotal.inc).toHaveBeenCalledWith({ method: 'GET', path: '/api/v1/unknown/:id', status: '404' });
    });

    it('should not measure the metrics endpoint itself', () => {
      const res = run({ method: 'GET', path: '/metrics' });
      res.emit('finish');

      expect(httpRequestsTotal.inc).not.toHaveBeenCalled();
    });
  });
});
