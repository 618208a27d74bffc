import { Router } from 'express';
import os from 'node:os';
import type { SessionRegistry } from '../lib/sessionRegistry.js';

export function createHealthRouter(registry: SessionRegistry): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    const memory = process.memoryUsage();
    const states = registry.countByState();
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      sessions: registry.size,
      viewers: states.connected,
      states,
      load: os.loadavg(),
      memory: {
        rss: memory.rss,
        heapUsed: memory.heapUsed,
      },
    });
  });

  return router;
}
