import { Staff } from '../connections/db/models';
import { OtpPurpose } from '../constants';

/**
 * Staff as exposed over the API
 */
export interface StaffResponse {
  id: string;
  email: string;
  first_name: string;
  last_name: string;
  role: Staff['role'];
  branch: Staff['branch'];
  is_verified: boolean;
  created_at: Date;
}

export interface RegisterResponse {
  staff: StaffResponse;
  otp_sent: boolean;
}

export interface OtpSentResponse {
  otp_sent: boolean;
}

export interface ResendOtpResponse extends OtpSentResponse {
  purpose: OtpPurpose;
}

export interface LoginResponse {
  staff: StaffResponse;
  access: string;
  refresh: string;
}

export interface RefreshTokenResponse {
  access: string;
}
