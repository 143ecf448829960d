import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (raw: string): string[] =>
  raw
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);

const DURATION_UNITS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/**
 * Token lifetimes are written like "15m" or "7d"; a bare number means seconds
 */
export const parseDurationSeconds = (raw: string): number => {
  const match = /^(\d+)\s*([smhd]?)$/.exec(raw.trim());
  if (!match) {
    throw new Error(`Invalid duration: ${raw}`);
  }
  return Number(match[1]) * DURATION_UNITS[match[2] || 's'];
};

const durationSchema = z.string().regex(/^\d+\s*[smhd]?$/, 'Expected a duration such as 15m or 7d');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  FRONTEND_URL: z.string().default('http://localhost:5173'),
  CORS_ORIGINS: z.string().default(''),

  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().default('it_desk'),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default(''),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),

  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().nonnegative().default(0),
  BROKER_BACKEND: z.enum(['redis', 'memory']).default('redis'),

  JWT_SECRET: z.string().min(1).default('secret'),
  JWT_ACCESS_EXPIRES_IN: durationSchema.default('15m'),
  JWT_REFRESH_EXPIRES_IN: durationSchema.default('7d'),

  EMAIL_BACKEND: z.enum(['smtp', 'json']).default('smtp'),
  SMTP_HOST: z.string().default('smtp.gmail.com'),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: z.string().default(''),
  SMTP_PASS: z.string().default(''),
  DEFAULT_FROM_EMAIL: z.string().email().default('noreply@paramount.co.ke'),
  STAFF_EMAIL_DOMAIN: z.string().min(2).default('@paramount.co.ke'),
  IT_SUPPORT_EMAIL: z.preprocess(
    value => (value === '' ? undefined : value),
    z.string().email().optional()
  ),
  WEBSITE_LINK: z.string().default('http://localhost:5173'),

  OTP_TTL_MINUTES: z.coerce.number().positive().default(5),
  OTP_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),

  UPLOAD_DIR: z.string().default('./uploads'),
  MAX_FILE_SIZE: z.coerce.number().int().positive().default(10 * 1024 * 1024), // 10MB
});

export type Environment = z.infer<typeof envSchema>['NODE_ENV'];

export interface AppConfig {
  port: number;
  nodeEnv: Environment;
  frontendUrl: string;
  corsOrigins: string[];
  maxFileSize: number;
  uploadDir: string;
  jwt: {
    secret: string;
    accessTtlSeconds: number;
    refreshTtlSeconds: number;
  };
  db: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    max: number;
  };
  redis: {
    host: string;
    port: number;
    password?: string;
    db: number;
  };
  broker: 'redis' | 'memory';
  email: {
    backend: 'smtp' | 'json';
    host: string;
    port: number;
    user: string;
    pass: string;
    from: string;
  };
  staff: {
    emailDomain: string;
    supportEmail?: string;
    websiteLink: string;
  };
  otp: {
    ttlMinutes: number;
    sweepIntervalMs: number;
  };
}

/**
 * Build the application configuration from environment variables.
 * Called once at startup; the result is handed to every component that needs it.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.parse(env);

  // Domain restriction is a suffix match, so a bare "example.com" becomes "@example.com"
  const emailDomain = parsed.STAFF_EMAIL_DOMAIN.startsWith('@')
    ? parsed.STAFF_EMAIL_DOMAIN.toLowerCase()
    : `@${parsed.STAFF_EMAIL_DOMAIN.toLowerCase()}`;

  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    frontendUrl: parsed.FRONTEND_URL,
    corsOrigins: parseCorsOrigins(parsed.CORS_ORIGINS),
    maxFileSize: parsed.MAX_FILE_SIZE,
    uploadDir: parsed.UPLOAD_DIR,
    jwt: {
      secret: parsed.JWT_SECRET,
      accessTtlSeconds: parseDurationSeconds(parsed.JWT_ACCESS_EXPIRES_IN),
      refreshTtlSeconds: parseDurationSeconds(parsed.JWT_REFRESH_EXPIRES_IN),
    },
    db: {
      host: parsed.DB_HOST,
      port: parsed.DB_PORT,
      database: parsed.DB_NAME,
      user: parsed.DB_USER,
      password: parsed.DB_PASSWORD,
      max: parsed.DB_POOL_MAX,
    },
    redis: {
      host: parsed.REDIS_HOST,
      port: parsed.REDIS_PORT,
      password: parsed.REDIS_PASSWORD,
      db: parsed.REDIS_DB,
    },
    broker: parsed.BROKER_BACKEND,
    email: {
      backend: parsed.EMAIL_BACKEND,
      host: parsed.SMTP_HOST,
      port: parsed.SMTP_PORT,
      user: parsed.SMTP_USER,
      pass: parsed.SMTP_PASS,
      from: parsed.DEFAULT_FROM_EMAIL,
    },
    staff: {
      emailDomain,
      supportEmail: parsed.IT_SUPPORT_EMAIL,
      websiteLink: parsed.WEBSITE_LINK,
    },
    otp: {
      ttlMinutes: parsed.OTP_TTL_MINUTES,
      sweepIntervalMs: parsed.OTP_SWEEP_INTERVAL_MS,
    },
  };
};
