// Database
export { createPool, connectDatabase, migrate, rollback } from './db';

// Redis
export { createRedisClient, connectRedis } from './redis';
export type { RedisClient } from './redis';

// Config
export { loadConfig } from './config/app.config';
export type { AppConfig } from './config/app.config';
