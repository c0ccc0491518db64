// src/routes/itinerary.ts: build an itinerary from traveler preferences; warm the vector index
import express, { Request, Response, NextFunction } from 'express';
import type { PlannerDeps } from '@/services/pipeline-deps';
import { syncEmbeddings } from '@/services/providers/inventory/embedding-sync';
import { validateItineraryRequest } from '@/schemas/itinerary.validation';
import { createErrorResponse, createSuccessResponse } from '@/utils/errorResponse';
import { logger } from '@/services/logger';

export type ItineraryRouteDeps = Pick<PlannerDeps, 'assembler' | 'store' | 'vector' | 'embedder' | 'embeddingDim'>;

export function createItineraryRouter(deps: ItineraryRouteDeps): express.Router {
  const router = express.Router();

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateItineraryRequest(req.body);
    if (!validation.success) {
      res.status(400).json(createErrorResponse('Invalid itinerary request', validation.error, 'validation_error'));
      return;
    }

    try {
      const started = Date.now();
      const itinerary = await deps.assembler.buildItinerary(validation.data);
      logger.info(`itinerary ${itinerary.tripId} in ${Date.now() - started}ms`, {
        correlationId: res.locals.correlationId,
      });
      res.json(createSuccessResponse(itinerary));
    } catch (err) {
      next(err);
    }
  });

  router.post('/warmup', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const synced = await syncEmbeddings(deps.store, deps.vector, deps.embedder, deps.embeddingDim);
      res.json(createSuccessResponse({ backend: deps.vector.name, synced }));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
