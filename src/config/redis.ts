import { createClient } from 'redis';
import { config } from './env';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const redisConfig = {
  socket: {
    host: config.redis.host,
    port: config.redis.port,
    connectTimeout: 5000,
    // Disable automatic reconnection to prevent error spam
    reconnectStrategy: false as const,
  },
  password: config.redis.password,
};

export const redisClient = createClient(redisConfig);

let redisErrorLogged = false;

redisClient.on('error', (err: unknown) => {
  // Only log error once to avoid spam
  if (!redisErrorLogged) {
    redisErrorLogged = true;
    if (config.nodeEnv === 'production') {
      logger.error('Redis Client Error:', { error: errorMessage(err) });
    } else {
      logger.warn('⚠️  Redis connection error (order locks fall back to in-process):', { error: errorMessage(err) });
    }
  }
});

redisClient.on('connect', () => {
  logger.info('✅ Redis connecting...');
});

redisClient.on('ready', () => {
  logger.info('✅ Redis connected successfully');
});

export const connectRedis = async (): Promise<void> => {
  let timer: NodeJS.Timeout | undefined;
  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error('Connection timeout')), 5000);
    });

    await Promise.race([redisClient.connect(), timeoutPromise]);
  } catch (error) {
    // Redis is optional: order locks degrade to a per-process mutex
    logger.warn('Redis not available, continuing without distributed order locks', {
      error: errorMessage(error),
    });
  } finally {
    clearTimeout(timer);
  }
};

export const disconnectRedis = async (): Promise<void> => {
  if (redisClient.isOpen) {
    await redisClient.quit();
    logger.info('Redis connection closed');
  }
};
