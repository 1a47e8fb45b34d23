import rateLimit from "express-rate-limit";
import { Request, Response } from 'express';

interface RateLimitMessage {
  error: string;
  retryAfter: number;
}

// Per-IP rate limiting for relay routes
export const createRateLimit = (
  windowMs: number,
  limit: number,
  message: string,
) => {
  const body: RateLimitMessage = {
    error: message,
    retryAfter: Math.ceil(windowMs / 1000)
  };

  return rateLimit({
    windowMs,
    limit,
    message: body,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      res.status(429).json(body);
    },
  });
};
