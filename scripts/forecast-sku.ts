import { config } from 'dotenv';
import { getContainer } from '../src/container';
import { closePool } from '../src/db';

config();

async function run() {
  const [sku, horizonArg] = process.argv.slice(2);
  if (!sku) {
    console.error('Usage: npm run forecast -- <sku> [horizonDays]');
    process.exit(1);
  }
  const horizonDays = horizonArg ? Number(horizonArg) : undefined;

  const container = getContainer();
  try {
    const result = await container.forecasts.forecast(sku, horizonDays);
    console.log(JSON.stringify(result, null, 2));
    process.exitCode = result.degraded ? 2 : 0;
  } finally {
    await container.cache.disconnect();
    await closePool();
  }
}

run().catch((err) => {
  console.error(err);
  process.exit(1);
});
