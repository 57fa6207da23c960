import { config } from 'dotenv';
import { getContainer } from '../src/container';
import { closePool } from '../src/db';
import { JOB_NAMES } from '../src/jobs/jobStatus';
import { findJob } from '../src/jobs/registry';

config();

async function run() {
  const name = process.argv[2];
  const job = name ? findJob(name) : null;
  if (!job) {
    console.error(`Usage: npm run job -- <${JOB_NAMES.join('|')}>`);
    process.exit(1);
  }

  const container = getContainer();
  try {
    const summary = await job.run(container);
    console.log(JSON.stringify(summary, null, 2));
  } finally {
    await container.cache.disconnect();
    await closePool();
  }
}

run().catch((err) => {
  console.error(err);
  process.exit(1);
});
