import { Router, Request, Response } from 'express';

import { getDatabaseStatus } from '../config/database';
import { getRedisStatus, isRedisConnected } from '../config/redis';
import { asyncHandler } from '../middlewares/errorHandler';
import { getReconciliationQueueStats, isReconciliationWorkerRunning } from '../queues';

const router = Router();

router.get('/', (_req: Request, res: Response) => {
  const dbStatus = getDatabaseStatus();
  const redisConnected = isRedisConnected();

  const isHealthy = dbStatus.connected && redisConnected;

  res.status(isHealthy ? 200 : 503).json({
    status: isHealthy ? 'healthy' : 'unhealthy',
    timestamp: new Date().toISOString(),
    services: {
      database: {
        connected: dbStatus.connected,
        readyState: dbStatus.readyState,
        indexesReady: dbStatus.indexesReady,
      },
      redis: {
        connected: redisConnected,
        status: getRedisStatus(),
      },
    },
  });
});

router.get('/live', (_req: Request, res: Response) => {
  res.status(200).json({
    status: 'alive',
    timestamp: new Date().toISOString(),
  });
});

// Redemptions need the ledger; Redis only backs caching and rate limiting
router.get('/ready', (_req: Request, res: Response) => {
  const { connected, indexesReady } = getDatabaseStatus();
  const isReady = connected && indexesReady;

  res.status(isReady ? 200 : 503).json({
    status: isReady ? 'ready' : 'not ready',
    timestamp: new Date().toISOString(),
  });
});

// Backlog of pending transactions waiting to be voided
router.get(
  '/queues',
  asyncHandler(async (_req: Request, res: Response) => {
    if (!isRedisConnected()) {
      res.status(503).json({
        status: 'unavailable',
        timestamp: new Date().toISOString(),
      });
      return;
    }

    res.status(200).json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      queues: {
        reconciliation: {
          ...(await getReconciliationQueueStats()),
          workerRunning: isReconciliationWorkerRunning(),
        },
      },
    });
  })
);

export default router;
