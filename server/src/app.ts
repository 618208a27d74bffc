import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import type { SessionRegistry } from './lib/sessionRegistry.js';
import { createHealthRouter } from './routes/health.js';
import { createSessionRouter } from './routes/sessionRoutes.js';

export interface AppOptions {
  registry: SessionRegistry;
  corsOrigins: string[];
  staticDir: string;
}

export function createApp({ registry, corsOrigins, staticDir }: AppOptions): Express {
  const app = express();

  app.use(
    cors({
      origin: corsOrigins,
      credentials: true,
    }),
  );
  app.use(express.json({ limit: '64kb' }));

  app.use('/health', createHealthRouter(registry));
  app.use('/api/sessions', createSessionRouter(registry));
  app.use(express.static(staticDir));

  return app;
}
