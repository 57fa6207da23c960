import { jobClock, type JobContext } from './context';
import { JobLock, skippedSummary, type JobRunSummary } from './jobStatus';

const lock = new JobLock('train-models', 'Model training');

/**
 * Weekly on Sunday at 22:00 UTC. The multiplicative model has nothing to fit,
 * so this only records that a run happened.
 */
export async function trainModels(context: JobContext): Promise<JobRunSummary> {
  const now = jobClock(context);

  return lock.run(async () => {
    console.log('📊 Model training is not implemented; multiplicative model needs no fitting');
    return skippedSummary('train-models', now(), 'model training not implemented');
  }, now);
}

export function getModelTrainingStatus() {
  return lock.status();
}
