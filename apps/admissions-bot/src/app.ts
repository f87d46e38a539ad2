import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import { requestIdMiddleware, httpLoggerMiddleware } from '@admissions/observability';
import type { Container } from './container';
import { errorHandler } from './middlewares/error-handler';
import { createV1Router } from './routes/v1.routes';

export type AppDeps = Pick<Container, 'poller' | 'dispatcher' | 'crmWebhook'>;

export function createApp({ poller, dispatcher, crmWebhook }: AppDeps): Express {
  const app: Express = express();

  app.use(cors());
  app.use(express.json());
  app.use(requestIdMiddleware);
  app.use(httpLoggerMiddleware);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'admissions-bot', timestamp: new Date().toISOString() });
  });

  app.get('/ready', (_req, res) => {
    const { polling, lastError, lastUpdateId } = poller.status();
    res.json({
      ready: polling,
      lastError,
      provider: 'telegram-bot-api',
      lastUpdateId,
      pendingSync: dispatcher.pending,
    });
  });

  app.use('/v1', createV1Router(crmWebhook));
  app.use(errorHandler);

  return app;
}
