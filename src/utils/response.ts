import { Response } from 'express';
import { logger } from './logging';

export interface ApiErrorBody {
  code?: string;
  details?: unknown;
}

export interface PaginationMeta {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
}

/**
 * Response envelope shared by every endpoint
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: ApiErrorBody;
  pagination?: PaginationMeta;
}

export class ResponseHandler {
  static success<T>(
    res: Response,
    data?: T,
    message: string = 'Success',
    statusCode: number = 200
  ): Response {
    const response: ApiResponse<T> = {
      success: true,
      message,
      data,
    };

    return res.status(statusCode).json(response);
  }

  static created<T>(res: Response, data?: T, message: string = 'Created'): Response {
    return this.success(res, data, message, 201);
  }

  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: ApiErrorBody
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
    };

    const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`[API Error] ${message}`, { statusCode, code: error?.code });

    return res.status(statusCode).json(response);
  }

  static validationError(
    res: Response,
    details: unknown,
    message: string = 'Invalid data'
  ): Response {
    return this.error(res, message, 400, { code: 'VALIDATION_ERROR', details });
  }

  static unauthorized(res: Response, message: string = 'Unauthorized'): Response {
    return this.error(res, message, 401, { code: 'UNAUTHORIZED' });
  }

  static forbidden(res: Response, message: string = 'Forbidden'): Response {
    return this.error(res, message, 403, { code: 'FORBIDDEN' });
  }

  static notFound(res: Response, message: string = 'Not found'): Response {
    return this.error(res, message, 404, { code: 'NOT_FOUND' });
  }

  static conflict(res: Response, message: string = 'Resource already exists', details?: unknown): Response {
    return this.error(res, message, 409, { code: 'CONFLICT', details });
  }

  static tooManyRequests(res: Response, message: string = 'Too many requests', retryAfter?: number): Response {
    return this.error(res, message, 429, {
      code: 'TOO_MANY_REQUESTS',
      details: retryAfter ? { retryAfter } : undefined,
    });
  }

  static paginated<T>(
    res: Response,
    data: T[],
    pagination: { page: number; limit: number; total: number },
    message: string = 'Success'
  ): Response {
    const response: ApiResponse<T[]> = {
      success: true,
      message,
      data,
      pagination: {
        ...pagination,
        totalPages: Math.ceil(pagination.total / pagination.limit),
      },
    };

    return res.status(200).json(response);
  }
}
