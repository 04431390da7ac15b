import { Request, Response, Router } from 'express';
import { DiscoveryService } from '../services/discoveryService';
import { parseInteraction, parseInteractionBatch, sendRouteError } from './requestParsing';

export function createInteractionRoutes(service: DiscoveryService): Router {
  const router = Router();

  /**
   * POST /interactions
   * Record a single view, like, share or purchase against the user's profile
   */
  router.post('/', async (req: Request, res: Response): Promise<void> => {
    try {
      const input = parseInteraction(req.body);
      await service.recordInteractions([input]);
      res.status(204).send();
    } catch (error) {
      sendRouteError(res, error, 'Failed to record interaction');
    }
  });

  /**
   * POST /interactions/batch
   * Record up to 100 interactions at once; nothing is written if any entry is invalid
   */
  router.post('/batch', async (req: Request, res: Response): Promise<void> => {
    try {
      const inputs = parseInteractionBatch(req.body);
      const recorded = await service.recordInteractions(inputs);
      res.json({ recorded });
    } catch (error) {
      sendRouteError(res, error, 'Failed to record interactions');
    }
  });

  return router;
}
