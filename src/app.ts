import express, { type NextFunction, type Request, type Response } from 'express';
import type { AppServices } from './container';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { requestLoggerMiddleware } from './middleware/requestLogger.middleware';
import { createAccuracyRouter } from './routes/accuracy.routes';
import { createAlertsRouter } from './routes/alerts.routes';
import { createForecastsRouter } from './routes/forecasts.routes';
import { createHealthRouter } from './routes/health.routes';
import { createJobsRouter } from './routes/jobs.routes';

function clientErrorStatus(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 500 ? error.status : null;
  }
  return null;
}

export function createApp(services: AppServices) {
  const app = express();
  app.use(express.json());
  app.use(requestContextMiddleware);
  app.use(requestLoggerMiddleware);

  app.use(createHealthRouter(services));
  app.use(createForecastsRouter(services));
  app.use(createAlertsRouter(services));
  app.use(createAccuracyRouter(services));
  app.use(createJobsRouter(services));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Malformed JSON bodies and anything a router passed to next(err).
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = clientErrorStatus(error);
    if (status !== null) {
      res.status(status).json({ error: 'Invalid request.' });
      return;
    }
    console.error(error);
    res.status(500).json({ error: 'An internal server error occurred.' });
  });

  return app;
}
