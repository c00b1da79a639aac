import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { config } from './config';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';
import { createHealthRoutes, HealthChecks } from './routes/health';
import { AccrualLedger, Clock, StakingController, createStakingRoutes } from './services/staking';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
} from './observability';

export interface AppDependencies {
  ledger: AccrualLedger;
  clock: Clock;
  healthChecks?: HealthChecks;
}

export const createApp = ({ ledger, clock, healthChecks = {} }: AppDependencies): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);

  // Routes
  app.use('/health', createHealthRoutes(healthChecks));
  app.use('/staking', createStakingRoutes(new StakingController(ledger, clock)));

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

  app.get('/', (_req, res) => {
    res.json({
      name: 'StakeFlow API',
      version: '1.0.0',
      description: 'Single-asset staking ledger with fixed-rate reward accrual',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
