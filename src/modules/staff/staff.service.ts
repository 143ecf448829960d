import { StaffPage, StaffRepository } from './staff.repository';
import { SessionTokens, TokenService, TOKEN_TYPE } from './token.service';
import { OtpService } from '../otp/otp.service';
import { NotificationGateway } from '../notifications/notification.gateway';
import { Staff, UpdateStaffInput } from '../../connections/db/models';
import { Branch, OTP_PURPOSE, OtpPurpose, StaffRole } from '../../constants';
import {
  AccountNotVerifiedError,
  AlreadyRegisteredError,
  AuthenticationError,
  DomainNotAllowedError,
  ForbiddenError,
  NotFoundError,
  UnknownAccountError,
} from '../../utils/errors';
import { auditLog, errorMeta, logger } from '../../utils/logging';

export interface RegisterStaffInput {
  email: string;
  first_name: string;
  last_name: string;
  branch?: Branch;
}

export interface OtpDispatch {
  otpSent: boolean;
}

export interface RegistrationResult extends OtpDispatch {
  staff: Staff;
}

export interface ResendResult extends OtpDispatch {
  purpose: OtpPurpose;
}

export type VerificationResult =
  | { purpose: typeof OTP_PURPOSE.REGISTRATION; staff: Staff }
  | ({ purpose: typeof OTP_PURPOSE.LOGIN; staff: Staff } & SessionTokens);

export interface ProfileChanges {
  first_name?: string;
  last_name?: string;
  branch?: Branch;
}

export interface StaffAdminChanges {
  role?: StaffRole;
  branch?: Branch;
}

export type OtpSender = Pick<NotificationGateway, 'sendOtp'>;

export const normalizeEmail = (email: string): string => email.trim().toLowerCase();

/**
 * Staff accounts and sessions. Accounts are only ever verified, and sessions
 * only ever issued, through a successful OTP check.
 */
export class StaffService {
  constructor(
    private readonly staffRepository: StaffRepository,
    private readonly otpService: OtpService,
    private readonly notifier: OtpSender,
    private readonly tokens: TokenService,
    private readonly emailDomain: string
  ) {}

  async register(input: RegisterStaffInput): Promise<RegistrationResult> {
    const email = normalizeEmail(input.email);

    if (!email.endsWith(this.emailDomain)) {
      throw new DomainNotAllowedError(this.emailDomain);
    }

    const existing = await this.staffRepository.findByEmail(email);
    if (existing?.is_verified) {
      throw new AlreadyRegisteredError();
    }

    const staff = await this.staffRepository.upsertUnverified({
      email,
      first_name: input.first_name,
      last_name: input.last_name,
      branch: input.branch,
    });
    // Verified by a concurrent request between the lookup and the upsert
    if (!staff) {
      throw new AlreadyRegisteredError();
    }

    const otpSent = await this.issueAndSend(staff, OTP_PURPOSE.REGISTRATION);

    auditLog('STAFF_REGISTERED', { staffId: staff.id, email, otpSent });
    return { staff, otpSent };
  }

  async requestLogin(rawEmail: string): Promise<OtpDispatch> {
    const staff = await this.requireAccount(rawEmail);

    if (!staff.is_verified) {
      throw new AccountNotVerifiedError();
    }

    const otpSent = await this.issueAndSend(staff, OTP_PURPOSE.LOGIN);
    return { otpSent };
  }

  async resendOtp(rawEmail: string): Promise<ResendResult> {
    const staff = await this.requireAccount(rawEmail);
    const purpose = staff.is_verified ? OTP_PURPOSE.LOGIN : OTP_PURPOSE.REGISTRATION;

    const otpSent = await this.issueAndSend(staff, purpose);
    return { purpose, otpSent };
  }

  async verifyAndIssueCredential(
    rawEmail: string,
    code: string,
    purpose: OtpPurpose
  ): Promise<VerificationResult> {
    const staff = await this.requireAccount(rawEmail);

    await this.otpService.verify(staff.email, purpose, code);

    if (purpose === OTP_PURPOSE.REGISTRATION) {
      const verified = await this.staffRepository.markVerified(staff.id);
      if (!verified) {
        throw new UnknownAccountError();
      }
      auditLog('STAFF_VERIFIED', { staffId: staff.id, email: staff.email });
      return { purpose, staff: verified };
    }

    const tokens = this.tokens.issuePair(staff);
    auditLog('STAFF_LOGIN', { staffId: staff.id, email: staff.email });
    return { purpose, staff, ...tokens };
  }

  async refreshSession(refreshToken: string): Promise<{ access: string }> {
    const claims = await this.tokens.verifyRefresh(refreshToken);
    const staff = await this.staffRepository.findById(claims.sub);

    if (!staff || !staff.is_verified) {
      throw new AuthenticationError('Account is no longer active');
    }

    return { access: this.tokens.issueAccess(staff) };
  }

  async logout(refreshToken: string, requesterId: string): Promise<void> {
    const claims = this.tokens.verify(refreshToken, TOKEN_TYPE.REFRESH);

    if (claims.sub !== requesterId) {
      throw new ForbiddenError('Refresh token belongs to another account');
    }

    await this.tokens.revoke(claims);
    auditLog('STAFF_LOGOUT', { staffId: requesterId, jti: claims.jti });
  }

  /**
   * Resolve a bearer access token to the verified account it was issued to
   */
  async resolveSession(accessToken: string): Promise<Staff> {
    const claims = this.tokens.verify(accessToken, TOKEN_TYPE.ACCESS);
    const staff = await this.staffRepository.findById(claims.sub);

    if (!staff || !staff.is_verified) {
      throw new AuthenticationError('Account is no longer active');
    }
    return staff;
  }

  async getProfile(id: string): Promise<Staff> {
    const staff = await this.staffRepository.findById(id);
    if (!staff) {
      throw new NotFoundError('Staff member');
    }
    return staff;
  }

  async updateProfile(id: string, changes: ProfileChanges): Promise<Staff> {
    const updated = await this.staffRepository.update(id, {
      first_name: changes.first_name,
      last_name: changes.last_name,
      branch: changes.branch,
    });
    if (!updated) {
      throw new NotFoundError('Staff member');
    }
    return updated;
  }

  async listStaff(page: number, limit: number): Promise<StaffPage> {
    return this.staffRepository.list(limit, (page - 1) * limit);
  }

  async updateStaff(id: string, changes: StaffAdminChanges, adminId: string): Promise<Staff> {
    const update: UpdateStaffInput = { role: changes.role, branch: changes.branch };
    const updated = await this.staffRepository.update(id, update);
    if (!updated) {
      throw new NotFoundError('Staff member');
    }
    auditLog('STAFF_UPDATED_BY_ADMIN', { staffId: id, adminId, ...changes });
    return updated;
  }

  private async requireAccount(rawEmail: string): Promise<Staff> {
    const staff = await this.staffRepository.findByEmail(normalizeEmail(rawEmail));
    if (!staff) {
      throw new UnknownAccountError();
    }
    return staff;
  }

  /**
   * The code stays stored even when the email fails; the caller reports otp_sent: false
   */
  private async issueAndSend(staff: Staff, purpose: OtpPurpose): Promise<boolean> {
    const code = await this.otpService.issue(staff.email, purpose);
    try {
      await this.notifier.sendOtp(staff.email, staff, code, purpose);
      return true;
    } catch (error) {
      logger.error('[Staff] OTP email delivery failed', {
        staffId: staff.id,
        email: staff.email,
        purpose,
        ...errorMeta(error),
      });
      return false;
    }
  }
}
