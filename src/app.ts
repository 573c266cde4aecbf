import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { config } from './config';
import { AppServices, buildServices, createDefaultDependencies } from './container';
import { errorHandler, notFoundHandler, globalLimiter } from './middlewares';
import healthRoutes from './routes/health';
import { ContentMetadataController, createContentMetadataRouter } from './services/pricing';
import { SubsidyController, createSubsidyRouter } from './services/subsidy';
import { correlationMiddleware, metricsMiddleware, getMetrics, getMetricsContentType, logger } from './observability';

export const API_PREFIX = '/api/v1';

export const createApp = (services: AppServices = buildServices(createDefaultDependencies())): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({ origin: config.api.corsOrigins }));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));
  app.use(express.urlencoded({ extended: true, limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);
  app.use(globalLimiter);

  // Routes
  app.use('/health', healthRoutes);
  app.use(
    `${API_PREFIX}/content-metadata`,
    createContentMetadataRouter(new ContentMetadataController(services.pricing))
  );
  app.use(
    `${API_PREFIX}/subsidies`,
    createSubsidyRouter(new SubsidyController(services.subsidyService, services.redemptionService))
  );

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'Learner Credit Subsidy API',
      version: '1.0.0',
      description: 'Stored-value subsidies redeemed against catalog content',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
