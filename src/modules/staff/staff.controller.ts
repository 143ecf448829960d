import { Response } from 'express';
import { StaffService } from './staff.service';
import {
  adminUpdateStaffSchema,
  emailSchema,
  listStaffQuerySchema,
  logoutSchema,
  refreshTokenSchema,
  registerSchema,
  staffIdParamSchema,
  updateProfileSchema,
  verifyOtpSchema,
} from './staff.validation';
import { Staff } from '../../connections/db/models';
import { OTP_PURPOSE } from '../../constants';
import { AuthRequest } from '../../types/request.types';
import {
  LoginResponse,
  OtpSentResponse,
  RefreshTokenResponse,
  RegisterResponse,
  ResendOtpResponse,
  StaffResponse,
} from '../../types/response.types';
import { AuthenticationError } from '../../utils/errors';
import { ResponseHandler } from '../../utils/response';

export const toStaffResponse = (staff: Staff): StaffResponse => ({
  id: staff.id,
  email: staff.email,
  first_name: staff.first_name,
  last_name: staff.last_name,
  role: staff.role,
  branch: staff.branch,
  is_verified: staff.is_verified,
  created_at: staff.created_at,
});

const currentStaff = (req: AuthRequest): Staff => {
  if (!req.user) {
    throw new AuthenticationError();
  }
  return req.user;
};

export const createStaffController = (staffService: StaffService) => ({
  // POST /staff/register
  register: async (req: AuthRequest, res: Response) => {
    const validated = registerSchema.parse(req.body);
    const { staff, otpSent } = await staffService.register(validated);

    const data: RegisterResponse = { staff: toStaffResponse(staff), otp_sent: otpSent };
    return ResponseHandler.created(
      res,
      data,
      otpSent
        ? 'An OTP has been sent to your email.'
        : 'Registered, but the OTP email could not be sent. Request a new code.'
    );
  },

  // POST /staff/verify-otp
  verifyRegistration: async (req: AuthRequest, res: Response) => {
    const { email, otp } = verifyOtpSchema.parse(req.body);
    const result = await staffService.verifyAndIssueCredential(email, otp, OTP_PURPOSE.REGISTRATION);

    return ResponseHandler.success(res, { staff: toStaffResponse(result.staff) }, 'Email verified.');
  },

  // POST /staff/resend-otp
  resendOtp: async (req: AuthRequest, res: Response) => {
    const { email } = emailSchema.parse(req.body);
    const { purpose, otpSent } = await staffService.resendOtp(email);

    const data: ResendOtpResponse = { purpose, otp_sent: otpSent };
    return ResponseHandler.success(
      res,
      data,
      otpSent ? 'A new OTP has been sent to your email.' : 'The OTP email could not be sent.'
    );
  },

  // POST /staff/login/request
  requestLogin: async (req: AuthRequest, res: Response) => {
    const { email } = emailSchema.parse(req.body);
    const { otpSent } = await staffService.requestLogin(email);

    const data: OtpSentResponse = { otp_sent: otpSent };
    return ResponseHandler.success(
      res,
      data,
      otpSent ? 'OTP sent to email.' : 'The OTP email could not be sent.'
    );
  },

  // POST /staff/login/verify
  verifyLogin: async (req: AuthRequest, res: Response) => {
    const { email, otp } = verifyOtpSchema.parse(req.body);
    const result = await staffService.verifyAndIssueCredential(email, otp, OTP_PURPOSE.LOGIN);

    if (result.purpose !== OTP_PURPOSE.LOGIN) {
      throw new AuthenticationError();
    }

    const data: LoginResponse = {
      staff: toStaffResponse(result.staff),
      access: result.access,
      refresh: result.refresh,
    };
    return ResponseHandler.success(res, data, 'Login successful.');
  },

  // POST /staff/token/refresh
  refresh: async (req: AuthRequest, res: Response) => {
    const { refresh } = refreshTokenSchema.parse(req.body);
    const data: RefreshTokenResponse = await staffService.refreshSession(refresh);

    return ResponseHandler.success(res, data, 'Token refreshed.');
  },

  // POST /staff/logout
  logout: async (req: AuthRequest, res: Response) => {
    const { refresh_token } = logoutSchema.parse(req.body);
    await staffService.logout(refresh_token, currentStaff(req).id);

    return ResponseHandler.success(res, null, 'Logout successful.');
  },

  // GET /staff/me
  getProfile: async (req: AuthRequest, res: Response) => {
    const staff = await staffService.getProfile(currentStaff(req).id);
    return ResponseHandler.success(res, toStaffResponse(staff));
  },

  // PUT /staff/me
  updateProfile: async (req: AuthRequest, res: Response) => {
    const changes = updateProfileSchema.parse(req.body);
    const staff = await staffService.updateProfile(currentStaff(req).id, changes);

    return ResponseHandler.success(res, toStaffResponse(staff), 'Profile updated.');
  },

  // GET /staff (admin)
  listStaff: async (req: AuthRequest, res: Response) => {
    const { page, limit } = listStaffQuerySchema.parse(req.query);
    const { rows, total } = await staffService.listStaff(page, limit);

    return ResponseHandler.paginated(res, rows.map(toStaffResponse), { page, limit, total });
  },

  // PATCH /staff/:id (admin)
  updateStaff: async (req: AuthRequest, res: Response) => {
    const { id } = staffIdParamSchema.parse(req.params);
    const changes = adminUpdateStaffSchema.parse(req.body);
    const staff = await staffService.updateStaff(id, changes, currentStaff(req).id);

    return ResponseHandler.success(res, toStaffResponse(staff), 'Staff member updated.');
  },
});

export type StaffController = ReturnType<typeof createStaffController>;
