import dotenv from 'dotenv';
dotenv.config();

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import config from './config';

// Import routes
import pushRoutes from './routes/push';
import statusRoutes from './routes/status';

// Import middleware
import { apiKeyAuth } from './middleware/auth';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import logger from './utils/logger';
import { closePushClient } from './utils/pushClient';

// Initialize Express app
const app = express();

// Middleware
app.use(helmet()); // Secure HTTP headers
app.use(cors());
app.use(express.json());

// Routes
app.use('/api/status', statusRoutes);
app.use('/api/push', apiKeyAuth, pushRoutes); // Protected route

// Error handling middleware
app.use(notFoundHandler);
app.use(errorHandler);

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}. Starting graceful shutdown...`);

  try {
    await closePushClient();
    logger.info('APNs connections closed successfully');
  } catch (error) {
    logger.error('Error during graceful shutdown:', error);
  }

  process.exit(0);
}

if (process.env.NODE_ENV !== 'test') {
  // Register signal handlers
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

  app.listen(config.service.port, () => {
    logger.info(`Server is running on port ${config.service.port}`);
    logger.info(`Environment: ${config.env}`);
  });
}

export default app;
