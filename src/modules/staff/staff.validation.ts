import { z } from 'zod';
import { BRANCHES, STAFF_ROLES } from '../../constants';

const emailField = z.string().trim().email('Invalid email address');
const nameField = z.string().trim().min(1, 'Name is required').max(30, 'Name must be at most 30 characters');
const otpField = z.string().trim().regex(/^\d{6}$/, 'OTP must be 6 digits');

export const registerSchema = z.object({
  email: emailField,
  first_name: nameField,
  last_name: nameField,
  branch: z.enum(BRANCHES).optional(),
});

export const emailSchema = z.object({
  email: emailField,
});

export const verifyOtpSchema = z.object({
  email: emailField,
  otp: otpField,
});

export const refreshTokenSchema = z.object({
  refresh: z.string().min(1, 'Refresh token is required'),
});

export const logoutSchema = z.object({
  refresh_token: z.string().min(1, 'Refresh token is required'),
});

export const updateProfileSchema = z
  .object({
    first_name: nameField.optional(),
    last_name: nameField.optional(),
    branch: z.enum(BRANCHES).optional(),
  })
  .refine(data => Object.values(data).some(value => value !== undefined), {
    message: 'Provide at least one field to update',
  });

export const adminUpdateStaffSchema = z
  .object({
    role: z.enum(STAFF_ROLES).optional(),
    branch: z.enum(BRANCHES).optional(),
  })
  .refine(data => data.role !== undefined || data.branch !== undefined, {
    message: 'Provide a role or a branch',
  });

export const staffIdParamSchema = z.object({
  id: z.string().uuid('Invalid staff id'),
});

export const listStaffQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});
