// OneTimePasscode Model - Based on migration 20251120_000002_create_one_time_passcodes_table

import { OtpPurpose } from '../../../constants';

export interface OneTimePasscode {
  id: number;
  email: string;
  code: string; // 6 digits
  purpose: OtpPurpose;
  created_at: Date;
  expires_at: Date;
  consumed_at: Date | null; // set on successful verification
  invalidated_at: Date | null; // set when a newer code for the same purpose is issued
}

export interface CreateOneTimePasscodeInput {
  email: string;
  code: string;
  purpose: OtpPurpose;
  expires_at: Date;
}
