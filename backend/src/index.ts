import { config } from './config.js';
import { createLogger } from './logger.js';
import { createServer } from './server.js';
import { HealthAggregator } from './services/health.js';
import { PollerScheduler } from './services/poller.js';
import { DeviceRegistry, loadDeviceFile } from './services/registry.js';
import { SseHub } from './services/sse.js';
import { TelemetryStore } from './services/store.js';
import { StreamHubClient } from './services/streamhub.js';
import type { SessionEvent } from './types/telemetry.js';

const log = createLogger('main');

async function main() {
  const registry = new DeviceRegistry(config.poller.intervalMs);
  const devices = await loadDeviceFile(config.devicesFile);
  for (const d of devices) registry.add(d);
  if (devices.length === 0) log.warn(`no devices found in ${config.devicesFile}`);

  const store = new TelemetryStore();
  const hub = new SseHub<SessionEvent>();
  store.onEvent((event) => hub.broadcast(event.type, event));

  const poller = new PollerScheduler({
    registry,
    client: new StreamHubClient(),
    store,
    settings: config.poller,
    historyWindowMs: config.health.historyWindowMs,
  });
  const health = new HealthAggregator(poller, store);

  const app = createServer({ store, health, hub, authToken: config.authToken });
  const server = app.listen(config.port, () => {
    log.info(`API listening on http://0.0.0.0:${config.port}`);
  });
  const keepAlive = setInterval(() => hub.ping(), 15_000);

  poller.start();

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info(`${signal} received, shutting down`);
    clearInterval(keepAlive);
    poller
      .stop()
      .catch((err) => log.error('poller shutdown failed', err))
      .finally(() => {
        hub.closeAll();
        server.close(() => process.exit(0));
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  log.error('startup failed', err);
  process.exit(1);
});
