import { Router, type Request, type Response } from 'express';
import type { AppServices } from '../container';
import { toIsoDate } from '../lib/dates';
import { asyncErrorHandler, forecastingErrorMap } from '../middleware/validation/errors';
import { featuresQuerySchema, forecastQuerySchema, skuParamSchema } from '../schemas/forecasting.schema';

type ForecastRouteServices = Pick<AppServices, 'store' | 'forecasts' | 'features' | 'clock'>;

export function createForecastsRouter(services: ForecastRouteServices): Router {
  const router = Router();
  const today = () => toIsoDate((services.clock ?? (() => new Date()))());

  router.get(
    '/forecasts/:sku',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const params = skuParamSchema.safeParse(req.params);
      if (!params.success) {
        return res.status(400).json({ error: params.error.flatten() });
      }
      const parsed = forecastQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }

      const profile = await services.store.getSkuProfile(params.data.sku);
      if (!profile) {
        return res.status(404).json({ error: 'SKU not found.' });
      }

      const result = await services.forecasts.forecast(params.data.sku, parsed.data.horizonDays, parsed.data.modelType);
      return res.json(result);
    }, forecastingErrorMap)
  );

  router.get(
    '/forecasts/:sku/features',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const params = skuParamSchema.safeParse(req.params);
      if (!params.success) {
        return res.status(400).json({ error: params.error.flatten() });
      }
      const parsed = featuresQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }

      const { date, ...options } = parsed.data;
      const assembly = await services.features.assembleFeatures(params.data.sku, date ?? today(), options);
      return res.json({
        sku: assembly.sku,
        date: assembly.forecastDate,
        features: assembly.value,
        degraded: assembly.degraded,
        degradedGroups: assembly.degradedGroups
      });
    }, forecastingErrorMap)
  );

  return router;
}
