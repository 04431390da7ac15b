import { Request, Response, NextFunction, RequestHandler } from 'express';
import * as logger from 'firebase-functions/logger';

// The key comes from the API_KEY environment variable (Secret Manager in production)

export function createApiKeyValidator(validApiKey: string | null): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers['x-api-key'];
    const apiKey = typeof header === 'string' ? header : req.query.apiKey;

    if (!validApiKey) {
      logger.error('API_KEY environment variable not set!');
      res.status(500).json({
        error: 'Internal Server Error',
        message: 'API key not configured'
      });
      return;
    }

    if (typeof apiKey !== 'string' || apiKey !== validApiKey) {
      res.status(403).json({
        error: 'Forbidden',
        message: 'Invalid or missing API key'
      });
      return;
    }

    next();
  };
}
