import { createServer } from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { HOUR_MS } from './engine/windower.js';
import { errorMessage } from './errors.js';
import { logger, setLogLevel } from './observability/logger.js';
import { createRuntime } from './runtime.js';

const DEMO_SEED_HOURS = 24;

const config = loadConfig();
setLogLevel(config.logLevel);

const runtime = createRuntime(config);
const { scheduler } = runtime;
const app = createApp({
  repository: runtime.repository,
  job: runtime.job,
  analyticsConfig: config.analytics,
  defaultMethod: config.engine.allocationMethod,
  schedulerStatus: scheduler ? () => scheduler.status() : undefined
});
const server = createServer(app);

async function seedDemoHistory(): Promise<void> {
  const end = new Date(Math.floor(Date.now() / HOUR_MS) * HOUR_MS);
  const start = new Date(end.getTime() - DEMO_SEED_HOURS * HOUR_MS);
  const run = await runtime.job.runOnce({ range: { start: start.toISOString(), end: end.toISOString() } });
  logger.info('demo_history_seeded', { runId: run.runId, status: run.status, allocatedCount: run.allocatedCount });
}

async function startBackgroundWork(): Promise<void> {
  if (config.collection.seedDemoData) {
    await seedDemoHistory();
  }
  scheduler?.start();
}

startBackgroundWork().catch((error: unknown) => {
  logger.error('background_start_failed', { error: errorMessage(error) });
});

server.listen(config.server.port, config.server.host, () => {
  logger.info(`API listening on http://${config.server.host}:${config.server.port}`, {
    persistenceBackend: config.persistence.backend,
    allocationMethod: config.engine.allocationMethod,
    schedulerEnabled: config.collection.schedulerEnabled
  });
});

process.on('SIGTERM', () => {
  scheduler?.stop();
  server.close(() => {
    runtime.close();
    logger.info('server_stopped');
  });
});
