// Import type definitions first (side-effect import for type augmentation)
import './types/express';

import http from 'http';
import app from './app';
import { config } from './config/env';
import { connectDatabase, disconnectDatabase } from './config/database';
import { connectRedis, disconnectRedis } from './config/redis';
import { getServices } from './services';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

const httpServer = http.createServer(app);

httpServer.on('error', (error: NodeJS.ErrnoException) => {
  logger.error('❌ HTTP Server error:', { error: error.message, code: error.code });
  if (error.code === 'EADDRINUSE') {
    logger.error(`Port ${config.port} is already in use. Please use a different port.`);
    process.exit(1);
  }
});

const start = async (): Promise<void> => {
  logger.info('🚀 Starting server...');
  logger.info(`📝 Environment: ${config.nodeEnv}`);

  // Webhooks are only acknowledged once they are durable, so the store comes first
  await connectDatabase();

  // Optional: order locks fall back to an in-process mutex
  await connectRedis();

  const services = getServices();
  logger.info(`🔌 Hosts configured: ${services.hosts.listHosts().length}`);

  await new Promise<void>(resolve => {
    httpServer.listen(config.port, '0.0.0.0', () => resolve());
  });
  logger.info(`🚀 Server running on port ${config.port}`);
  logger.info(`🌐 API URL: ${config.apiUrl}`);

  services.sweeper.start();
  logger.info('🟢 Fulfillment sweeper started');
};

let shuttingDown = false;

const shutdown = async (signal: string): Promise<void> => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`${signal} received, shutting down gracefully`);

  try {
    await new Promise<void>(resolve => {
      httpServer.close(() => resolve());
    });
    logger.info('✅ HTTP server closed');

    await getServices().sweeper.stop();
    await disconnectRedis();
    await disconnectDatabase();
    process.exit(0);
  } catch (error) {
    logger.error('Shutdown failed', { error: errorMessage(error) });
    process.exit(1);
  }
};

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Promise Rejection:', { error: errorMessage(reason) });
});

start().catch((error: unknown) => {
  logger.error('❌ Startup failed', { error: errorMessage(error) });
  process.exit(1);
});
