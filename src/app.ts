// Import type definitions first
import './types/express';

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config/env';
import { isDatabaseConnected } from './config/database';
import { redisClient } from './config/redis';
import { logger } from './utils/logger';
import webhookRoutes from './routes/webhooks.routes';
import routes from './routes';
import { notFoundHandler, errorHandler } from './middleware';

const app = express();

app.get('/health', (req, res) => {
  const database = isDatabaseConnected();
  res.status(database ? 200 : 503).json({
    status: database ? 'ok' : 'degraded',
    database,
    redis: redisClient.isReady,
    time: new Date().toISOString(),
    uptime: process.uptime(),
  });
});

// Trust the reverse proxy in front of the service so req.ip is the client's
if (config.nodeEnv === 'production') {
  app.set('trust proxy', 1);
  logger.info('Trust proxy enabled for production (reverse proxy support)');
}

// Security middleware
app.use(helmet());

// Only the admin panel calls from a browser
app.use(
  cors({
    origin: config.nodeEnv === 'development' ? true : config.corsOrigin,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Service-Token'],
    optionsSuccessStatus: 204,
  })
);

// Webhook routes - must be before the JSON body parser
app.use('/webhooks', webhookRoutes);

// Body parsing middleware
app.use(express.json({ limit: '100kb' }));

app.use('/api', routes);

// 404 handler (must be after all routes)
app.use(notFoundHandler);

// Error handler (must be last)
app.use(errorHandler);

export default app;
