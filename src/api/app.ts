import express, { type Express } from 'express';
import helmet from 'helmet';
import { createHealthRouter, type HealthCheckable } from '@/api/health';
import { createMetricsRouter } from '@/api/metrics';
import { errorHandler, notFoundHandler } from '@/api/error-handler';
import type { MetricsService } from '@/services/metrics';
import type { PollerStatus } from '@/services/poller';

export interface AppDependencies {
  services: Record<string, HealthCheckable>;
  metrics: MetricsService;
  getStatus: () => PollerStatus;
}

export function createApp({ services, metrics, getStatus }: AppDependencies): Express {
  const app = express();
  app.use(helmet());

  app.use('/api', createHealthRouter(services));
  app.use('/', createMetricsRouter(metrics));

  app.get('/', (req, res) => {
    res.json({
      name: 'hashtag-welcome-bot',
      status: 'running',
      poller: getStatus()
    });
  });

  // Must come after the routes or the 404 handler answers everything
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
