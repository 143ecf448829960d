import { Response, NextFunction } from 'express';
import { TokenExpiredError } from 'jsonwebtoken';
import { Staff } from '../connections/db/models';
import { StaffRole } from '../constants';
import { AuthRequest } from '../types/request.types';
import { ResponseHandler } from '../utils/response';
import { logger, errorMeta } from '../utils/logging';

export type SessionResolver = (token: string) => Promise<Staff>;

export const extractBearerToken = (header: string | undefined): string | null => {
  if (!header?.startsWith('Bearer ')) {
    return null;
  }
  return header.slice('Bearer '.length).trim() || null;
};

export const createAuthenticate = (resolveSession: SessionResolver) => {
  return async (req: AuthRequest, res: Response, next: NextFunction) => {
    const token = extractBearerToken(req.headers.authorization);

    if (!token) {
      return ResponseHandler.unauthorized(res, 'Authentication credentials were not provided');
    }

    try {
      req.user = await resolveSession(token);
    } catch (error) {
      logger.warn('[Auth] Rejected bearer token', { ip: req.ip, url: req.originalUrl, ...errorMeta(error) });
      return ResponseHandler.unauthorized(
        res,
        error instanceof TokenExpiredError ? 'Token has expired' : 'Invalid token'
      );
    }

    next();
  };
};

export const requireRole = (...roles: StaffRole[]) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
    if (!req.user) {
      return ResponseHandler.unauthorized(res, 'Not authenticated');
    }

    if (!roles.includes(req.user.role)) {
      return ResponseHandler.forbidden(res, 'You do not have permission to perform this action');
    }

    next();
  };
};
