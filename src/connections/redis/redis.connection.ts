import { createClient } from 'redis';
import { AppConfig } from '../config/app.config';
import { logger, errorMeta } from '../../utils/logging';

export type RedisClient = ReturnType<typeof createClient>;

export const createRedisClient = (redisConfig: AppConfig['redis']): RedisClient => {
  const client = createClient({
    socket: {
      host: redisConfig.host,
      port: redisConfig.port,
    },
    ...(redisConfig.password && { password: redisConfig.password }),
    database: redisConfig.db,
  });

  client.on('error', (err: Error) => {
    logger.error('Redis Client Error', errorMeta(err));
  });

  return client;
};

/**
 * Connect to Redis
 * @returns Promise that resolves when Redis is connected
 */
export const connectRedis = async (client: RedisClient): Promise<void> => {
  try {
    if (!client.isOpen) {
      await client.connect();
      logger.info('Redis connected successfully');
    } else {
      logger.info('Redis already connected');
    }
  } catch (err) {
    logger.error('Failed to connect to Redis:', errorMeta(err));
    throw err;
  }
};
