import express, { Request, Response, Router } from 'express';
import { DiscoveryFeedBuilder } from '../../services/discoveryFeedBuilder';
import { DiscoveryService } from '../../services/discoveryService';
import { InMemoryEventCatalog } from '../../services/eventCatalog';
import { InterestProfileOptions } from '../../services/interestProfile';
import { InMemoryInterestProfileStore } from '../../services/interestProfileStore';
import { RecommendationEngine } from '../../services/recommendationEngine';
import { Clock } from '../../utils/clock';
import { serializeFeedSection, serializeInterestProfile, serializeScoredEvent } from '../feedHelpers';
import { parseRecommendationRequest, RecommendationRequestBody, sendRouteError } from '../requestParsing';
import { buildMockEvents } from './fixtures';
import { getPersona, MOCK_PERSONAS, personaProfiles } from './personas';

export interface MockRoutesDeps {
  engine: RecommendationEngine;
  feedBuilder: DiscoveryFeedBuilder;
  clock: Clock;
  defaultLimit: number;
  profileOptions?: InterestProfileOptions;
}

/**
 * Persona-driven routes over fixture events. Nothing here touches the database,
 * so the ranking can be explored without credentials.
 */
export function createMockRoutes(deps: MockRoutesDeps): Router {
  const router = express.Router();
  const personaStore = new InMemoryInterestProfileStore(personaProfiles(), deps.clock);

  // Fixtures are positioned relative to the request's `now`
  function serviceAt(now: Date): DiscoveryService {
    return new DiscoveryService({
      profiles: personaStore,
      catalog: new InMemoryEventCatalog(buildMockEvents(now)),
      engine: deps.engine,
      feedBuilder: deps.feedBuilder,
      profileOptions: deps.profileOptions,
    });
  }

  function requirePersona(body: RecommendationRequestBody, res: Response): boolean {
    if (!getPersona(body.userId)) {
      res.status(400).json({ error: 'Unknown mock persona' });
      return false;
    }
    return true;
  }

  /**
   * GET /mock/personas
   * Lists the personas with their derived profile summary
   */
  router.get('/personas', async (req: Request, res: Response): Promise<void> => {
    try {
      const service = serviceAt(deps.clock.now());
      const personas = await Promise.all(
        Array.from(MOCK_PERSONAS.values()).map(async persona => ({
          userId: persona.userId,
          description: persona.description,
          profile: serializeInterestProfile(await service.getProfile(persona.userId)),
        }))
      );
      res.json({ count: personas.length, personas });
    } catch (error) {
      sendRouteError(res, error, 'Failed to list mock personas');
    }
  });

  router.post('/recommendations', async (req: Request, res: Response): Promise<void> => {
    try {
      const body = parseRecommendationRequest(req.body);
      if (!requirePersona(body, res)) {
        return;
      }
      const now = body.now ?? deps.clock.now();
      const result = await serviceAt(now).recommend(
        { userId: body.userId, now, location: body.location },
        body.limit ?? deps.defaultLimit
      );

      res.json({
        count: result.recommendations.length,
        personalized: result.personalized,
        confidence: result.profile.confidenceScore(),
        recommendations: result.recommendations.map(item => serializeScoredEvent(item, now)),
        mode: 'mock-persona',
      });
    } catch (error) {
      sendRouteError(res, error, 'Failed to build mock recommendations');
    }
  });

  router.post('/feed', async (req: Request, res: Response): Promise<void> => {
    try {
      const body = parseRecommendationRequest(req.body);
      if (!requirePersona(body, res)) {
        return;
      }
      const now = body.now ?? deps.clock.now();
      const result = await serviceAt(now).buildFeed({ userId: body.userId, now, location: body.location });

      res.json({
        personalized: result.personalized,
        sections: result.sections.map(section => serializeFeedSection(section, now)),
        mode: 'mock-persona',
      });
    } catch (error) {
      sendRouteError(res, error, 'Failed to build mock feed');
    }
  });

  return router;
}
