import { Request, Response, NextFunction } from 'express';
import { isPushClientError } from '../utils/errors';
import logger from '../utils/logger';

interface CustomError extends Error {
  statusCode?: number;
}

/**
 * Error handler middleware. Push client errors carry their own status code and kind.
 */
export const errorHandler = (err: CustomError, req: Request, res: Response, next: NextFunction): void => {
  const statusCode = err.statusCode || 500;
  const kind = isPushClientError(err) ? err.kind : undefined;

  logger.error(`${statusCode} - ${kind ?? err.name}: ${err.message} - ${req.originalUrl} - ${req.method} - ${req.ip}`);
  if (statusCode >= 500) {
    logger.error(err.stack || '');
  }

  res.status(statusCode).json({
    error: {
      message: process.env.NODE_ENV === 'production' && statusCode >= 500 ? 'Server error' : err.message,
      status: statusCode,
      kind,
    }
  });
};

/**
 * 404 Not Found handler
 */
export const notFoundHandler = (req: Request, res: Response, next: NextFunction): void => {
  const err: CustomError = new Error(`Not Found - ${req.originalUrl}`);
  err.statusCode = 404;
  logger.warn(`404 - ${req.originalUrl} - ${req.method} - ${req.ip}`);
  next(err);
};
