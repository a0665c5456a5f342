import type { Router } from 'express';
import express from 'express';
import type { FavouritesComparer } from '../core/favourites/FavouritesComparison.js';
import type { UnitSystem } from '../core/units/unitConverter.js';
import type { FavouriteLocationRepository } from '../persistence/repositories/FavouriteLocationRepository.js';
import { ValidationError } from '../utils/errors.js';
import { createLogger, generateRequestId } from '../utils/logger.js';
import { compareQuerySchema, newFavouriteSchema, parseOrThrow } from './validation.js';

export function createFavouritesRouter(
  repository: FavouriteLocationRepository,
  comparer: FavouritesComparer,
  defaultUnits: UnitSystem
): Router {
  const logger = createLogger({ component: 'favouritesRouter' });
  const router = express.Router();

  router.get('/', (_req, res) => {
    res.status(200).json({ favourites: repository.list() });
  });

  router.post('/', express.json(), (req, res) => {
    try {
      const location = parseOrThrow(newFavouriteSchema, req.body);
      const created = repository.add(location);
      if (!created) {
        res.status(409).json({ error: 'This place is already in favourites' });
        return;
      }
      logger.info({ favourite: created.label }, 'Favourite added');
      res.status(201).json(created);
    } catch (error) {
      if (error instanceof ValidationError) {
        res.status(400).json({ error: error.message, issues: error.issues });
        return;
      }
      logger.error({ error }, 'Error adding favourite');
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  router.delete('/:id', (req, res) => {
    const id = Number(req.params.id);
    if (!Number.isInteger(id) || id <= 0) {
      res.status(400).json({ error: 'Invalid favourite id' });
      return;
    }
    if (!repository.remove(id)) {
      res.status(404).json({ error: 'Favourite not found' });
      return;
    }
    res.status(204).end();
  });

  router.get('/compare', async (req, res) => {
    const requestLogger = logger.child({ requestId: generateRequestId() });

    try {
      const query = parseOrThrow(compareQuerySchema, req.query);
      const favourites = repository.list();
      const selected = query.ids
        ? [...new Set(query.ids)].flatMap((id) => favourites.filter((favourite) => favourite.id === id))
        : favourites;

      if (selected.length < 2) {
        res.status(400).json({ error: 'Add or select at least two favourites first' });
        return;
      }

      const comparison = await comparer.compare(selected, query.units ?? defaultUnits);
      res.status(200).json(comparison);
    } catch (error) {
      if (error instanceof ValidationError) {
        res.status(400).json({ error: error.message, issues: error.issues });
        return;
      }
      requestLogger.error({ error }, 'Error comparing favourites');
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
