import express, { RequestHandler } from 'express';
import { StaffController } from './staff.controller';
import { requireRole } from '../../middlewares/auth.middleware';
import { asyncHandler } from '../../middlewares/error.middleware';
import { createRateLimiters } from '../../middlewares/rateLimit.middleware';
import { STAFF_ROLE } from '../../constants';

export const createStaffRoutes = (controller: StaffController, authenticate: RequestHandler) => {
  const router = express.Router();
  const rateLimiters = createRateLimiters();

  // Public OTP flow
  router.post('/register', rateLimiters.auth, asyncHandler(controller.register));
  router.post('/verify-otp', asyncHandler(controller.verifyRegistration));
  router.post('/resend-otp', rateLimiters.verification, asyncHandler(controller.resendOtp));
  router.post('/login/request', rateLimiters.auth, asyncHandler(controller.requestLogin));
  router.post('/login/verify', asyncHandler(controller.verifyLogin));
  router.post('/token/refresh', asyncHandler(controller.refresh));

  // Authenticated
  router.post('/logout', authenticate, asyncHandler(controller.logout));
  router.get('/me', authenticate, asyncHandler(controller.getProfile));
  router.put('/me', authenticate, asyncHandler(controller.updateProfile));

  // Admin
  router.get('/', authenticate, requireRole(STAFF_ROLE.ADMIN), asyncHandler(controller.listStaff));
  router.patch('/:id', authenticate, requireRole(STAFF_ROLE.ADMIN), asyncHandler(controller.updateStaff));

  return router;
};
