import { Router } from 'express';

import type { MetricsCollector } from '../services/metricsCollector.service';

export const createMetricsRouter = (metricsCollector: MetricsCollector): Router => {
  const router = Router();

  // Always 200: a stale or missing vendor token shows up in mb_exporter_auth_status.
  router.get('/metrics', async (_req, res, next) => {
    try {
      const { contentType, body } = await metricsCollector.render();
      res.status(200).setHeader('Content-Type', contentType);
      res.send(body);
    } catch (error) {
      next(error);
    }
  });

  return router;
};
