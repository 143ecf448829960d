/**
 * One-time passcode purposes. A code issued for one purpose never verifies another.
 */
export const OTP_PURPOSE = {
  REGISTRATION: 'registration',
  LOGIN: 'login',
} as const;

export type OtpPurpose = typeof OTP_PURPOSE[keyof typeof OTP_PURPOSE];

export const OTP_CODE_LENGTH = 6;

// Expired rows are kept this long before the sweep deletes them
export const OTP_RETENTION_MS = 24 * 60 * 60 * 1000;
