import { Router, type Request, type Response } from 'express';
import type { AppServices } from '../container';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { accuracyQuerySchema } from '../schemas/forecasting.schema';

export function createAccuracyRouter(services: Pick<AppServices, 'accuracy'>): Router {
  const router = Router();

  router.get(
    '/accuracy',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = accuracyQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.json(await services.accuracy.getSummary(parsed.data.windowDays));
    })
  );

  return router;
}
