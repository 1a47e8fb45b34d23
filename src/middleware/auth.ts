import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';

/**
 * Middleware to authenticate relay requests using API key
 */
export const apiKeyAuth = (req: Request, res: Response, next: NextFunction): void => {
  const apiKey = req.header('x-api-key');
  const expected = process.env.PUSH_API_KEY;

  if (!expected || !apiKey || apiKey !== expected) {
    logger.warn(`Unauthorized API access attempt from ${req.ip}`);
    res.status(401).json({ error: 'Unauthorized: Invalid API key' });
    return;
  }

  next();
};
