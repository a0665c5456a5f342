import type { Router } from 'express';
import express from 'express';
import type { ForecastService } from '../core/forecast/ForecastService.js';
import type { UnitSystem } from '../core/units/unitConverter.js';
import { ValidationError } from '../utils/errors.js';
import { createLogger, generateRequestId } from '../utils/logger.js';
import { forecastQuerySchema, parseOrThrow } from './validation.js';

export function createForecastRouter(forecastService: ForecastService, defaultUnits: UnitSystem): Router {
  const logger = createLogger({ component: 'forecastRouter' });
  const router = express.Router();

  router.get('/', async (req, res) => {
    const requestLogger = logger.child({ requestId: generateRequestId() });

    try {
      const query = parseOrThrow(forecastQuerySchema, req.query);
      const insights = await forecastService.getInsights({
        latitude: query.lat,
        longitude: query.lon,
        units: query.units ?? defaultUnits,
        timezone: query.timezone,
        day: query.day,
      });

      if (!insights) {
        res.status(503).json({ error: 'Forecast unavailable' });
        return;
      }
      res.status(200).json(insights);
    } catch (error) {
      if (error instanceof ValidationError) {
        res.status(400).json({ error: error.message, issues: error.issues });
        return;
      }
      requestLogger.error({ error }, 'Error building forecast insights');
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
