import { Router } from 'express';
import type { ClientSession } from '../lib/clientSession.js';
import type { SessionRegistry } from '../lib/sessionRegistry.js';

export function describeSession(session: ClientSession) {
  return {
    id: session.id,
    state: session.state,
    needsKeyframe: session.needsKeyframe,
    pendingFrames: session.pendingFrames,
    ...session.stats,
  };
}

export function createSessionRouter(registry: SessionRegistry): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ sessions: registry.snapshot().map(describeSession) });
  });

  router.get('/:id', (req, res) => {
    const session = registry.get(req.params.id);
    if (!session) {
      res.status(404).json({ error: 'NOT_FOUND' });
      return;
    }
    res.json(describeSession(session));
  });

  router.delete('/:id', (req, res) => {
    const session = registry.get(req.params.id);
    if (!session) {
      res.status(404).json({ error: 'NOT_FOUND' });
      return;
    }
    session.close('revoked');
    res.json({ status: 'revoked' });
  });

  return router;
}
