import { randomInt, timingSafeEqual } from 'crypto';
import { OtpRepository } from './otp.repository';
import { OTP_CODE_LENGTH, OTP_RETENTION_MS, OtpPurpose } from '../../constants';
import { AlreadyConsumedError, ExpiredCodeError, OtpMismatchError } from '../../utils/errors';
import { auditLog, logger } from '../../utils/logging';

export interface OtpServiceOptions {
  ttlMinutes: number;
  retentionMs?: number;
  now?: () => Date;
}

export const generateOtpCode = (): string =>
  randomInt(0, 10 ** OTP_CODE_LENGTH).toString().padStart(OTP_CODE_LENGTH, '0');

const codesMatch = (expected: string, received: string): boolean => {
  const a = Buffer.from(expected);
  const b = Buffer.from(received);
  return a.length === b.length && timingSafeEqual(a, b);
};

/**
 * Issues and checks one-time passcodes. Only the most recently issued code
 * for an (email, purpose) pair can ever verify.
 */
export class OtpService {
  private readonly now: () => Date;

  constructor(
    private readonly repository: OtpRepository,
    private readonly options: OtpServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async issue(email: string, purpose: OtpPurpose): Promise<string> {
    const code = generateOtpCode();
    const expiresAt = new Date(this.now().getTime() + this.options.ttlMinutes * 60 * 1000);

    await this.repository.replaceOutstanding({
      email: email.toLowerCase(),
      code,
      purpose,
      expires_at: expiresAt,
    });

    auditLog('OTP_ISSUED', { email, purpose, expiresAt: expiresAt.toISOString() });
    return code;
  }

  async verify(email: string, purpose: OtpPurpose, code: string): Promise<void> {
    const record = await this.repository.findLatest(email.toLowerCase(), purpose);

    if (!record || !codesMatch(record.code, code)) {
      logger.warn('[OTP] Code mismatch', { email, purpose });
      throw new OtpMismatchError();
    }

    if (record.consumed_at) {
      throw new AlreadyConsumedError();
    }

    if (this.now().getTime() > record.expires_at.getTime()) {
      logger.warn('[OTP] Code expired', { email, purpose, otpId: record.id });
      throw new ExpiredCodeError();
    }

    const consumed = await this.repository.markConsumed(record.id, this.now());
    if (!consumed) {
      throw await this.describeLostConsume(record.id);
    }

    auditLog('OTP_CONSUMED', { email, purpose, otpId: record.id });
  }

  /**
   * Delete codes that expired before the cutoff. Verification rejects expired
   * codes on its own; this only reclaims storage.
   */
  async purgeExpired(
    olderThan: Date = new Date(this.now().getTime() - (this.options.retentionMs ?? OTP_RETENTION_MS))
  ): Promise<number> {
    const deleted = await this.repository.deleteExpiredBefore(olderThan);
    if (deleted > 0) {
      logger.info('[OTP] Purged expired codes', { deleted, olderThan: olderThan.toISOString() });
    }
    return deleted;
  }

  /**
   * Explain a conditional consume that matched no row
   */
  private async describeLostConsume(id: number): Promise<Error> {
    const current = await this.repository.findById(id);

    if (!current || current.invalidated_at !== null) {
      logger.warn('[OTP] Code superseded before consumption', { otpId: id });
      return new OtpMismatchError();
    }
    if (current.consumed_at === null && this.now().getTime() > current.expires_at.getTime()) {
      return new ExpiredCodeError();
    }
    return new AlreadyConsumedError();
  }
}
