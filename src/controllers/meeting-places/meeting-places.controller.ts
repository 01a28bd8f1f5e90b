/**
 * Meeting Places Controller
 * POST /api/v1/meetings/place-recommendations - full pipeline
 * POST /api/v1/meetings/place-keywords        - context and keywords only
 */

import { Router, type NextFunction, type Request, type Response } from 'express';
import type { MeetingPlacePipeline } from '../../services/meeting-places/pipeline.js';
import { createValidationError } from '../../middleware/error.middleware.js';
import {
  PlaceRecommendationRequestSchema,
  toPipelineInput,
  type PlaceRecommendationRequest,
} from './meeting-places.dto.js';

export type MeetingPlaceService = Pick<MeetingPlacePipeline, 'analyze' | 'runFullPipeline'>;

function parseBody(body: unknown): PlaceRecommendationRequest {
  const validation = PlaceRecommendationRequestSchema.safeParse(body);
  if (!validation.success) {
    throw createValidationError('Invalid request', validation.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    })));
  }
  return validation.data;
}

export function createMeetingPlacesRouter(pipeline: MeetingPlaceService): Router {
  const router = Router();

  router.post('/place-recommendations', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(req.body);
      const result = await pipeline.runFullPipeline(toPipelineInput(body, req.traceId));

      res.json({
        traceId: req.traceId,
        context: result.context,
        keywords: result.keywords,
        totalCandidates: result.places.length,
        recommendations: result.recommendations,
        degradations: result.degradations,
      });
    } catch (err) {
      next(err);
    }
  });

  router.post('/place-keywords', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(req.body);
      const result = await pipeline.analyze(toPipelineInput(body, req.traceId));

      res.json({
        traceId: req.traceId,
        context: result.context,
        keywords: result.keywords,
        degradations: result.degradations,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
