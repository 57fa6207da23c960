import 'dotenv/config';
import { createApp } from './app';
import { resolveSchedulerStartupMode } from './config/schedulerStartup';
import { getContainer } from './container';
import { closePool } from './db';
import { registerForecastingJobs } from './jobs/registry';
import { startScheduler, stopScheduler } from './jobs/scheduler';

const PORT = Number(process.env.PORT) || 3000;

const container = getContainer();
const app = createApp(container);

const { runInProcessJobs, schedulerEnabled } = resolveSchedulerStartupMode();
if (schedulerEnabled) {
  registerForecastingJobs(container, container.schedule);
  startScheduler();
} else if (runInProcessJobs) {
  console.log('📅 In-process jobs requested but ENABLE_SCHEDULER is off in development');
}

const server = app.listen(PORT, () => {
  console.log(`Demand forecasting API listening on port ${PORT}`);
});

async function shutdown(signal: string): Promise<void> {
  console.log(`\n🛑 ${signal} received, shutting down...`);
  stopScheduler();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await container.cache.disconnect();
  await closePool();
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('❌ Shutdown failed:', error);
        process.exit(1);
      });
  });
}
