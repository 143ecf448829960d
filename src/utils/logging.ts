import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';

type LogMeta = Record<string, unknown>;

class LoggingConfig {
  private readonly logLevel: string;
  private readonly retention: string;
  private readonly maxSize: string;
  private readonly logDir: string;
  private readonly silent: boolean;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.logLevel = (env.LOG_LEVEL || 'info').toLowerCase();
    this.retention = env.LOG_RETENTION || '30d';
    this.maxSize = env.LOG_MAX_SIZE || '10m';
    this.logDir = env.LOG_DIR || path.join(process.cwd(), 'logs');
    // Jest runs must not write log files or spam the reporter
    this.silent = env.NODE_ENV === 'test';
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = typeof stack === 'string' ? `\n${stackPrefix}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat(): winston.Logform.Format {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf(info => this.formatLine(info, ''))
    );
  }

  private createFileFormat(): winston.Logform.Format {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(info => this.formatLine(info, 'Stack: '))
    );
  }

  private rotatingFile(prefix: string, level?: string): DailyRotateFile {
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${prefix}-%DATE%.log`),
      datePattern: 'YYYY-MM-DD',
      maxSize: this.maxSize,
      maxFiles: this.retention,
      zippedArchive: true,
      level,
      format: this.createFileFormat(),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.logLevel,
      format: this.createFileFormat(),
      transports: [],
      exitOnError: false,
    });

    logger.add(new winston.transports.Console({
      level: this.logLevel,
      format: this.createConsoleFormat(),
      silent: this.silent,
    }));

    if (this.silent) {
      return logger;
    }

    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }

    logger.add(this.rotatingFile('sys'));
    logger.add(this.rotatingFile('error', 'error'));
    logger.add(this.rotatingFile('combined', 'silly'));

    return logger;
  }
}

export const loggingConfig = new LoggingConfig();

export const logger = loggingConfig.setupLogging();

export { LoggingConfig };

/**
 * Audit trail for authentication and issue lifecycle events.
 */
export function auditLog(event: string, details: LogMeta = {}): void {
  logger.info(`[AUDIT] ${event}`, details);
}

export const errorMeta = (error: unknown): LogMeta =>
  error instanceof Error
    ? { error: error.message, stack: error.stack }
    : { error: String(error) };
