import { Request, Response, NextFunction } from 'express';
import { JsonWebTokenError, TokenExpiredError } from 'jsonwebtoken';
import { MulterError } from 'multer';
import { ZodError } from 'zod';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

const readProperty = (err: unknown, key: 'code' | 'status' | 'statusCode'): unknown =>
  typeof err === 'object' && err !== null ? Reflect.get(err, key) : undefined;

const messageOf = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

/**
 * Async handler wrapper: rejected promises go to the error middleware
 */
export const asyncHandler = <Req extends Request>(
  fn: (req: Req, res: Response, next: NextFunction) => Promise<unknown>
) => {
  return (req: Req, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
};

export const createErrorHandler = (exposeStack: boolean) => {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    // Zod validation errors
    if (err instanceof ZodError) {
      return ResponseHandler.validationError(
        res,
        err.errors.map(issue => ({ field: issue.path.join('.'), message: issue.message }))
      );
    }

    if (err instanceof AppError) {
      return ResponseHandler.error(res, err.message, err.statusCode, {
        code: err.code,
        details: err.details,
      });
    }

    // JWT errors; TokenExpiredError is a JsonWebTokenError, so it goes first
    if (err instanceof TokenExpiredError) {
      return ResponseHandler.unauthorized(res, 'Token has expired');
    }

    if (err instanceof JsonWebTokenError) {
      return ResponseHandler.unauthorized(res, 'Invalid token');
    }

    if (err instanceof MulterError) {
      return ResponseHandler.error(
        res,
        err.code === 'LIMIT_FILE_SIZE' ? 'Attachment is too large' : err.message,
        400,
        { code: err.code }
      );
    }

    // Database errors
    const code = readProperty(err, 'code');
    if (code === '23505') { // Unique violation
      return ResponseHandler.conflict(res, 'Resource already exists');
    }

    if (code === '23503') { // Foreign key violation
      return ResponseHandler.error(res, 'Referenced record does not exist', 400, {
        code: 'FOREIGN_KEY_VIOLATION',
      });
    }

    if (code === '22P02') { // Invalid text representation, e.g. a malformed UUID
      return ResponseHandler.error(res, 'Malformed identifier', 400, { code: 'INVALID_INPUT' });
    }

    // body-parser and other http-errors carry their own client status
    const status = readProperty(err, 'status') ?? readProperty(err, 'statusCode');
    if (typeof status === 'number' && status >= 400 && status < 500) {
      return ResponseHandler.error(res, messageOf(err), status, { code: 'BAD_REQUEST' });
    }

    logger.error('[Error Handler]', {
      message: messageOf(err),
      stack: err instanceof Error ? err.stack : undefined,
      url: req.originalUrl,
      method: req.method,
      ip: req.ip,
      userAgent: req.get('user-agent'),
    });

    return ResponseHandler.error(res, 'Internal server error', 500, {
      code: 'INTERNAL_ERROR',
      details: exposeStack && err instanceof Error ? err.stack : undefined,
    });
  };
};

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
