import { Router, type Request, type Response } from 'express';
import type { AppServices } from '../container';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { skuParamSchema } from '../schemas/forecasting.schema';

export function createAlertsRouter(services: Pick<AppServices, 'alerts'>): Router {
  const router = Router();

  router.get(
    '/alerts',
    asyncErrorHandler(async (_req: Request, res: Response) => {
      const alerts = await services.alerts.listOpenAlerts();
      return res.json({ data: alerts });
    })
  );

  router.get(
    '/alerts/recommendations',
    asyncErrorHandler(async (_req: Request, res: Response) => {
      return res.json(await services.alerts.getRecommendations());
    })
  );

  router.post(
    '/alerts/:sku/acknowledge',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const params = skuParamSchema.safeParse(req.params);
      if (!params.success) {
        return res.status(400).json({ error: params.error.flatten() });
      }
      const alert = await services.alerts.acknowledge(params.data.sku);
      if (!alert) {
        return res.status(404).json({ error: 'No open alert for this SKU.' });
      }
      return res.json(alert);
    })
  );

  return router;
}
