import Redis from 'ioredis';

let connection: Redis | null = null;

export function queueRedisUrl(env: NodeJS.ProcessEnv = process.env): string | null {
  return env.QUEUE_REDIS_URL ?? env.REDIS_URL ?? null;
}

export function getQueueConnection(): Redis {
  const url = queueRedisUrl();
  if (!url) {
    throw new Error('QUEUE_REDIS_URL or REDIS_URL must be set to use BullMQ');
  }
  if (connection) return connection;
  connection = new Redis(url, {
    // Required by BullMQ for blocking worker connections.
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    enableOfflineQueue: false,
    lazyConnect: true
  });
  connection.connect().catch((err: Error) => {
    console.error('❌ Queue Redis connection failed:', err.message);
  });
  return connection;
}

export async function closeQueueConnection(): Promise<void> {
  if (!connection) return;
  await connection.quit();
  connection = null;
}
