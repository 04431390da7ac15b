import { Request, Response, Router } from 'express';
import { DiscoveryService } from '../services/discoveryService';
import { Clock } from '../utils/clock';
import { serializeFeedSection, serializeScoredEvent } from './feedHelpers';
import { parseRecommendationRequest, sendRouteError } from './requestParsing';

export interface RecommendationRoutesOptions {
  clock: Clock;
  /** Used when the request does not ask for a limit. */
  defaultLimit: number;
}

export function createRecommendationRoutes(service: DiscoveryService, options: RecommendationRoutesOptions): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response): Promise<void> => {
    try {
      const body = parseRecommendationRequest(req.body);
      const now = body.now ?? options.clock.now();
      const result = await service.recommend(
        { userId: body.userId, now, location: body.location },
        body.limit ?? options.defaultLimit
      );

      res.json({
        count: result.recommendations.length,
        personalized: result.personalized,
        confidence: result.profile.confidenceScore(),
        recommendations: result.recommendations.map(item => serializeScoredEvent(item, now)),
      });
    } catch (error) {
      sendRouteError(res, error, 'Failed to build recommendations');
    }
  });

  router.post('/feed', async (req: Request, res: Response): Promise<void> => {
    try {
      const body = parseRecommendationRequest(req.body);
      const now = body.now ?? options.clock.now();
      const result = await service.buildFeed({ userId: body.userId, now, location: body.location });

      res.json({
        personalized: result.personalized,
        sections: result.sections.map(section => serializeFeedSection(section, now)),
      });
    } catch (error) {
      sendRouteError(res, error, 'Failed to build discovery feed');
    }
  });

  return router;
}
