import mongoose, { ConnectionStates } from 'mongoose';
import { config } from './env';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export const connectDatabase = async (): Promise<void> => {
  try {
    const options = {
      serverSelectionTimeoutMS: 5000, // Timeout after 5s instead of 30s
      socketTimeoutMS: 45000, // Close sockets after 45s of inactivity
      maxPoolSize: 10,
      minPoolSize: 2,
      maxIdleTimeMS: 30000,
      retryWrites: true,
      retryReads: true,
    };

    await mongoose.connect(config.mongodbUri, options);
    logger.info('✅ MongoDB connected successfully');
  } catch (error) {
    logger.error('❌ MongoDB connection error:', { error: errorMessage(error) });

    if (errorMessage(error).includes('ECONNREFUSED')) {
      logger.error('💡 MongoDB is not running. Start it or point MONGODB_URI at a reachable instance.');
    }

    throw error; // Re-throw to let the caller handle it
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  await mongoose.disconnect();
  logger.info('MongoDB connection closed');
};

export const isDatabaseConnected = (): boolean =>
  mongoose.connection.readyState === ConnectionStates.connected;

// Handle connection events
mongoose.connection.on('disconnected', () => {
  logger.warn('MongoDB disconnected - attempting to reconnect...');
});

mongoose.connection.on('error', (error: unknown) => {
  logger.error('MongoDB error:', { error: errorMessage(error) });
});

mongoose.connection.on('reconnected', () => {
  logger.info('✅ MongoDB reconnected successfully');
});
