import { Request, Response, Router } from 'express';
import { DiscoveryService } from '../services/discoveryService';
import { serializeInterestProfile } from './feedHelpers';
import { parsePreferencesPatch, sendRouteError } from './requestParsing';

function resolveCallerUserId(req: Request): string | undefined {
  const header = req.headers['x-user-id'];
  const headerUserId = typeof header === 'string' ? header : Array.isArray(header) ? header[0] : undefined;
  return headerUserId?.trim() || undefined;
}

/**
 * A caller identifying as someone else may not touch this profile.
 */
function resolveProfileUserId(req: Request, res: Response): string | null {
  const userId = (req.params.userId ?? '').trim();
  if (!userId) {
    res.status(400).json({ error: 'userId is required' });
    return null;
  }

  const callerUserId = resolveCallerUserId(req);
  if (callerUserId && callerUserId !== userId) {
    res.status(403).json({ error: 'Forbidden' });
    return null;
  }

  return userId;
}

export function createUserRoutes(service: DiscoveryService): Router {
  const router = Router();

  router.get('/:userId/interest-profile', async (req: Request, res: Response): Promise<void> => {
    try {
      const userId = resolveProfileUserId(req, res);
      if (!userId) {
        return;
      }
      const profile = await service.getProfile(userId);
      res.json(serializeInterestProfile(profile));
    } catch (error) {
      sendRouteError(res, error, 'Failed to load interest profile');
    }
  });

  router.put('/:userId/interest-profile/preferences', async (req: Request, res: Response): Promise<void> => {
    try {
      const userId = resolveProfileUserId(req, res);
      if (!userId) {
        return;
      }
      const patch = parsePreferencesPatch(req.body);
      const profile = await service.updatePreferences(userId, patch);
      res.json(serializeInterestProfile(profile));
    } catch (error) {
      sendRouteError(res, error, 'Failed to update preferences');
    }
  });

  router.delete('/:userId/interest-profile', async (req: Request, res: Response): Promise<void> => {
    try {
      const userId = resolveProfileUserId(req, res);
      if (!userId) {
        return;
      }
      await service.resetProfile(userId);
      res.status(204).send();
    } catch (error) {
      sendRouteError(res, error, 'Failed to reset interest profile');
    }
  });

  return router;
}
