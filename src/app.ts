import express from 'express';
import cors, { CorsOptions } from 'cors';
import path from 'path';
import { AppContext } from './context';
import { AppConfig } from './connections/config/app.config';
import { createApiRoutes } from './routes';
import { createAuthenticate } from './middlewares/auth.middleware';
import { createErrorHandler, notFoundHandler } from './middlewares/error.middleware';
import { logger, errorMeta } from './utils/logging';

const DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:5173',
];

const buildCorsOptions = (config: AppConfig): CorsOptions => {
  const allowedOrigins = [config.frontendUrl, ...config.corsOrigins].filter(origin => origin.length > 0);
  if (config.nodeEnv === 'development') {
    allowedOrigins.push(...DEV_ORIGINS.filter(origin => !allowedOrigins.includes(origin)));
  }

  return {
    origin: (origin, callback) => {
      // Requests with no origin (curl, server to server)
      if (!origin || allowedOrigins.includes(origin)) {
        return callback(null, true);
      }
      // In development, allow all origins if CORS_ORIGINS is not set
      if (config.nodeEnv === 'development' && config.corsOrigins.length === 0) {
        return callback(null, true);
      }
      callback(new Error('Not allowed by CORS'));
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin'],
    exposedHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'],
    maxAge: 86400, // 24 hours
    optionsSuccessStatus: 200,
  };
};

export const createApp = (ctx: AppContext) => {
  const app = express();
  const authenticate = createAuthenticate(token => ctx.staffService.resolveSession(token));

  // Middleware
  app.use(cors(buildCorsOptions(ctx.config)));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get('/health', async (req, res) => {
    try {
      await ctx.checkHealth();
      res.json({ status: 'ok', database: 'connected' });
    } catch (error) {
      logger.error('[Health] Database check failed', errorMeta(error));
      res.status(500).json({ status: 'error', database: 'disconnected' });
    }
  });

  // Stored attachments are only served to signed-in staff
  app.use('/uploads', authenticate, express.static(path.resolve(ctx.config.uploadDir)));

  // API Routes
  app.use('/api', createApiRoutes(ctx, authenticate));

  // Error handling
  app.use(notFoundHandler);
  app.use(createErrorHandler(ctx.config.nodeEnv === 'development'));

  return app;
};
