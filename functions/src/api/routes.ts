import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import { createApiKeyValidator } from '../middleware/auth';
import { DiscoveryService } from '../services/discoveryService';
import { Clock } from '../utils/clock';
import { createInteractionRoutes } from './interactions';
import { createMockRoutes, MockRoutesDeps } from './mock/routes';
import { createRecommendationRoutes } from './recommendations';
import { createUserRoutes } from './users';

export interface ApiAppDeps {
  service: DiscoveryService;
  clock: Clock;
  apiKey: string | null;
  recommendationLimit: number;
  mock: MockRoutesDeps;
}

export function createApiApp(deps: ApiAppDeps): Express {
  const app = express();
  app.use(cors({ origin: true }));
  app.use(express.json());

  // Mount mock routes (no auth required for faster dev iteration)
  app.use('/mock', createMockRoutes(deps.mock));

  // Apply auth to all other routes
  app.use(createApiKeyValidator(deps.apiKey));

  app.use('/recommendations', createRecommendationRoutes(deps.service, {
    clock: deps.clock,
    defaultLimit: deps.recommendationLimit,
  }));
  app.use('/interactions', createInteractionRoutes(deps.service));
  app.use('/users', createUserRoutes(deps.service));

  app.get('/status', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: deps.clock.now().toISOString(),
    });
  });

  return app;
}
