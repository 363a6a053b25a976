import { Router } from 'express';
import type { HealthAggregator } from '../services/health.js';

export function healthRouter(health: HealthAggregator) {
  const router = Router();

  // GET /healthz
  router.get('/', (_req, res) => {
    const snapshot = health.snapshot();
    res.status(snapshot.poller.running ? 200 : 503).json(snapshot);
  });

  return router;
}
