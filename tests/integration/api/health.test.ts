import request from 'supertest';

import { createTestContext } from '../../helpers/testApp';

describe('Health and metrics endpoints', () => {
  const { app } = createTestContext();

  it('should report unhealthy without database and Redis connections', async () => {
    const response = await request(app).get('/health');

    expect(response.status).toBe(503);
    expect(response.body).toMatchObject({
      status: 'unhealthy',
      services: {
        database: { connected: false },
        redis: { connected: false },
      },
    });
  });

  it('should report liveness regardless of dependencies', async () => {
    const response = await request(app).get('/health/live');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('alive');
  });

  it('should not be ready without the database', async () => {
    const response = await request(app).get('/health/ready');

    expect(response.status).toBe(503);
    expect(response.body.status).toBe('not ready');
  });

  it('should report queue stats as unavailable without Redis', async () => {
    const response = await request(app).get('/health/queues');

    expect(response.status).toBe(503);
    expect(response.body.status).toBe('unavailable');
  });

  it('should expose Prometheus metrics', async () => {
    const response = await request(app).get('/metrics');

    expect(response.status).toBe(200);
    expect(response.text).toContain('redemptions_total');
  });

  it('should describe the API at the root', async () => {
    const response = await request(app).get('/');

    expect(response.body.name).toBe('Learner Credit Subsidy API');
  });

  it('should answer 404 for unknown routes', async () => {
    const response = await request(app).get('/api/v1/unknown');

    expect(response.status).toBe(404);
    expect(response.body.error.message).toBe('Route GET /api/v1/unknown not found');
  });
});
