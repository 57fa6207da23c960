import { Router, type Request, type Response } from 'express';
import { parseNumber } from '../config/forecasting';
import type { AppServices } from '../container';
import { describeReferenceData } from '../domains/forecasting';
import { jobStatuses } from '../jobs/registry';
import { getAbandonedRuns } from '../jobs/scheduler';
import { errorMessage } from '../lib/stageResult';
import { isTimeoutError, withTimeout } from '../lib/timeouts';
import { asyncErrorHandler } from '../middleware/validation/errors';

const DB_TIMEOUT_MS = parseNumber(process.env.HEALTH_DB_TIMEOUT_MS, 1500);

export function createHealthRouter(services: Pick<AppServices, 'referenceData' | 'cache' | 'checkDatabase'>): Router {
  const router = Router();

  router.get('/health/live', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  router.get(
    '/health',
    asyncErrorHandler(async (_req: Request, res: Response) => {
      const referenceData = await services.referenceData.getReferenceData();
      return res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        referenceData: describeReferenceData(referenceData),
        cache: services.cache.getStats(),
        jobs: jobStatuses(),
        abandonedRuns: getAbandonedRuns()
      });
    })
  );

  router.get('/health/ready', async (_req: Request, res: Response) => {
    const start = Date.now();
    let db: Record<string, unknown>;
    try {
      await withTimeout(services.checkDatabase(), DB_TIMEOUT_MS, 'db');
      db = { ok: true };
    } catch (error) {
      db = { ok: false, error: errorMessage(error), timedOut: isTimeoutError(error) };
    }

    const ready = db.ok === true;
    res.status(ready ? 200 : 503).json({
      status: ready ? 'ok' : 'not_ready',
      ready,
      timestamp: new Date().toISOString(),
      details: { db, cache: services.cache.getStats(), durationMs: Date.now() - start }
    });
  });

  return router;
}
