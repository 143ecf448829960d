import http from 'http';
import { createApp } from './app';
import { createPgRepositories, createServices } from './context';
import {
  connectDatabase,
  connectRedis,
  createPool,
  createRedisClient,
  loadConfig,
  RedisClient,
} from './connections';
import { InMemoryMessageBroker, MessageBroker, RedisMessageBroker } from './modules/notifications/message-broker';
import { RealtimeRelay } from './modules/notifications/realtime.relay';
import { createMailer } from './modules/notifications/mailer';
import {
  InMemoryRevokedTokenStore,
  RedisRevokedTokenStore,
  RevokedTokenStore,
} from './modules/staff/revoked-token.store';
import { logger, errorMeta } from './utils/logging';

/**
 * Initialize connections and start server
 */
const startServer = async () => {
  const config = loadConfig();

  logger.info('Initializing connections...');

  // Connect to database
  logger.info('Connecting to database...');
  const pool = createPool(config.db);
  await connectDatabase(pool);

  let redis: RedisClient | null = null;
  let broker: MessageBroker;
  let revokedTokens: RevokedTokenStore;

  if (config.broker === 'memory') {
    logger.warn('BROKER_BACKEND=memory: notifications stay inside this process');
    broker = new InMemoryMessageBroker();
    revokedTokens = new InMemoryRevokedTokenStore();
  } else {
    logger.info('Connecting to Redis...');
    redis = createRedisClient(config.redis);
    await connectRedis(redis);
    broker = await RedisMessageBroker.create(redis);
    revokedTokens = new RedisRevokedTokenStore(redis);
  }

  const ctx = createServices(config, {
    repositories: createPgRepositories(pool),
    broker,
    revokedTokens,
    mailer: createMailer(config.email),
    checkHealth: async () => {
      await pool.query('SELECT 1');
    },
  });

  const server = http.createServer(createApp(ctx));
  const relay = new RealtimeRelay(broker, token => ctx.staffService.resolveSession(token));
  relay.attach(server);

  const sweep = setInterval(() => {
    ctx.otpService.purgeExpired().catch(error => {
      logger.error('[OTP] Sweep failed', errorMeta(error));
    });
  }, config.otp.sweepIntervalMs);
  sweep.unref();

  server.listen(config.port, () => {
    logger.info(`Server is running on port ${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
    logger.info('All services are ready!');
  });

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down...`);
    clearInterval(sweep);

    await relay.close();
    await new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
    await broker.close();
    if (redis?.isOpen) {
      await redis.quit();
    }
    await pool.end();

    logger.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('Shutdown failed', errorMeta(error));
          process.exit(1);
        });
    });
  }
};

// Start the application
startServer().catch(error => {
  logger.error('Failed to start server:', errorMeta(error));
  logger.error('Exiting application...');
  process.exit(1);
});
