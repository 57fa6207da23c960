import { Router, type Request, type Response } from 'express';
import type { AppServices } from '../container';
import { findJob, FORECASTING_JOBS } from '../jobs/registry';
import { getJobDefinitions } from '../jobs/scheduler';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { jobParamSchema } from '../schemas/forecasting.schema';

export function createJobsRouter(services: AppServices): Router {
  const router = Router();

  router.get('/jobs', (_req: Request, res: Response) => {
    // Jobs only appear here when server.ts runs node-cron; otherwise the worker owns them.
    const inProcess = new Set(getJobDefinitions().filter((definition) => definition.enabled).map(({ name }) => name));
    res.json({
      data: FORECASTING_JOBS.map((job) => ({
        name: job.name,
        description: job.description,
        schedule: services.schedule.crons[job.cronKey],
        scheduledInProcess: inProcess.has(job.name),
        status: job.status()
      }))
    });
  });

  router.post(
    '/jobs/:name/run',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const params = jobParamSchema.safeParse(req.params);
      const job = params.success ? findJob(params.data.name) : null;
      if (!job) {
        return res.status(404).json({ error: 'Job not found.' });
      }
      console.log(`🔧 Manually triggering job: ${job.name}`);
      return res.json(await job.run(services));
    })
  );

  return router;
}
