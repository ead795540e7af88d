import express, { Express } from 'express';
import { createCacheRouter } from './routes/cache';
import { createIdentifyRouter } from './routes/identify';
import { IdentificationService } from './services/identification';

export interface AppDependencies {
  service: IdentificationService;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(express.json());

  app.use('/api/identify', createIdentifyRouter(deps.service));
  app.use('/api/cache', createCacheRouter(deps.service.cache));

  app.get('/health', (req, res) => {
    res.json({ status: 'ok' });
  });

  return app;
}
