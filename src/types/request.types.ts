import { Request } from 'express';
import { Staff } from '../connections/db/models';

/**
 * Auth Request - request carrying the authenticated staff member
 */
export interface AuthRequest extends Request {
  user?: Staff;
}

