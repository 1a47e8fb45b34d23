import express, { Request, Response } from 'express';
import config from '../config';
import { Endpoint } from '../models/endpoint';

const router = express.Router();

/**
 * The endpoint the client connects to, or null when APNS_ENDPOINT cannot be parsed.
 */
const resolveEndpoint = (): string | null => {
  const name = process.env.APNS_ENDPOINT;
  if (!name) {
    return config.apns.defaultEndpoint.toString();
  }
  const endpoint = Endpoint.fromName(name);
  return endpoint ? endpoint.toString() : null;
};

/**
 * GET /status
 * Service information and the APNs endpoint the relay is configured for.
 */
router.get('/', (req: Request, res: Response): void => {
  const status = {
    service: config.service.name,
    version: process.env.npm_package_version || '1.0.0',
    uptime: process.uptime(),
    environment: config.env,
    endpoint: resolveEndpoint(),
    timestamp: new Date().toISOString(),
  };

  res.status(200).json(status);
});

/**
 * GET /status/health
 * Health check for load balancers and monitoring.
 */
router.get('/health', (req: Request, res: Response): void => {
  res.status(200).json({ status: 'ok' });
});

export default router;
