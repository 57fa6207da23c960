import 'dotenv/config';
import { parseNumber } from './config/forecasting';
import { getContainer } from './container';
import { closePool } from './db';
import { closeQueueConnection } from './queue/connection';
import { closeQueues, QUEUE_NAMES } from './queue/queues';
import { registerRepeatableJobs, startWorkers } from './queue/workers';

const REGISTER_JOBS = process.env.WORKER_REGISTER_JOBS !== 'false';

async function main(): Promise<void> {
  console.log('\n🧵 Starting worker process...');
  const container = getContainer();

  if (REGISTER_JOBS) {
    console.log('📅 Registering repeatable jobs...');
    await registerRepeatableJobs(container.schedule);
  }

  const workers = startWorkers(container, container.schedule, {
    [QUEUE_NAMES.collection]: parseNumber(process.env.WORKER_CONCURRENCY_COLLECTION, 1),
    [QUEUE_NAMES.batch]: parseNumber(process.env.WORKER_CONCURRENCY_BATCH, 1)
  });

  const shutdown = async (signal: string) => {
    console.log(`\n🛑 Worker ${signal} received, shutting down...`);
    await Promise.all(workers.map((worker) => worker.close()));
    await closeQueues();
    await closeQueueConnection();
    await container.cache.disconnect();
    await closePool();
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('❌ Worker shutdown failed:', error);
          process.exit(1);
        });
    });
  }
}

main().catch((error: unknown) => {
  console.error('❌ Worker failed to start:', error);
  process.exit(1);
});
