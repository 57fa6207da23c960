import { Queue } from 'bullmq';
import type { JobName } from '../jobs/jobStatus';
import { getQueueConnection } from './connection';

export const QUEUE_NAMES = {
  collection: 'forecasting-collection',
  batch: 'forecasting-batch'
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

const QUEUE_BY_JOB: Record<JobName, QueueName> = {
  'collect-weather': QUEUE_NAMES.collection,
  'collect-trends': QUEUE_NAMES.collection,
  'update-festival-calendar': QUEUE_NAMES.collection,
  'generate-forecasts': QUEUE_NAMES.batch,
  'calculate-accuracy': QUEUE_NAMES.batch,
  'generate-alerts': QUEUE_NAMES.batch,
  'train-models': QUEUE_NAMES.batch
};

/** External collection and SKU batch work run on separate queues so one cannot starve the other. */
export function queueFor(job: JobName): QueueName {
  return QUEUE_BY_JOB[job];
}

const queues = new Map<QueueName, Queue>();

export function getQueue(name: QueueName): Queue {
  const existing = queues.get(name);
  if (existing) return existing;
  const queue = new Queue(name, { connection: getQueueConnection() });
  queues.set(name, queue);
  return queue;
}

export async function closeQueues(): Promise<void> {
  await Promise.all([...queues.values()].map((queue) => queue.close()));
  queues.clear();
}
