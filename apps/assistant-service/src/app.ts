import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import { httpLoggerMiddleware, requestIdMiddleware } from '@helpdesk/observability';
import { createV1Router, type V1RouterOptions } from './routes/v1.routes';
import { errorHandler } from './middlewares/error-handler';
import type { DialogueService } from './services/dialogue.service';

export function createApp(service: DialogueService, options: V1RouterOptions): Express {
  const app: Express = express();

  app.use(cors());
  app.use(express.json());
  app.use(requestIdMiddleware);
  app.use(httpLoggerMiddleware);

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'assistant-service',
      sessions: service.activeSessions(),
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/v1', createV1Router(service, options));
  app.use(errorHandler);
  return app;
}
