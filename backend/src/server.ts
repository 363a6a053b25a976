import express from 'express';
import cors from 'cors';
import { config } from './config.js';
import { errorHandler } from './middleware/error.js';
import { requireToken } from './middleware/auth.js';
import { healthRouter } from './routes/health.js';
import { sessionsRouter } from './routes/sessions.js';
import type { HealthAggregator } from './services/health.js';
import type { SseHub } from './services/sse.js';
import type { TelemetryStore } from './services/store.js';
import type { SessionEvent } from './types/telemetry.js';

export type ServerDeps = {
  store: TelemetryStore;
  health: HealthAggregator;
  hub: SseHub<SessionEvent>;
  authToken?: string;
};

export function createServer(deps: ServerDeps) {
  const app = express();

  app.disable('x-powered-by');
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: '256kb' }));

  app.use('/healthz', healthRouter(deps.health));
  app.use('/api/sessions', requireToken(deps.authToken), sessionsRouter(deps.store, deps.hub));

  app.use(errorHandler);
  return app;
}
