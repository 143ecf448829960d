/**
 * Application error taxonomy. Every error a service raises on purpose is an
 * AppError; the error middleware turns it into a response envelope.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Validation

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class DomainNotAllowedError extends AppError {
  constructor(domain: string) {
    super(`Email must end with ${domain}`, 400, 'DOMAIN_NOT_ALLOWED', { domain });
  }
}

// Authorization

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication credentials were not provided or are invalid') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'You do not have permission to perform this action') {
    super(message, 403, 'FORBIDDEN');
  }
}

// Lookup

export class NotFoundError extends AppError {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

export class UnknownAccountError extends AppError {
  constructor(
    message: string = 'No staff account is registered for this email',
    statusCode: number = 404,
    code: string = 'UNKNOWN_ACCOUNT'
  ) {
    super(message, statusCode, code);
  }
}

export class AccountNotVerifiedError extends UnknownAccountError {
  constructor() {
    super('Email not verified', 403, 'ACCOUNT_NOT_VERIFIED');
  }
}

// State

export class AlreadyRegisteredError extends AppError {
  constructor() {
    super('A verified account already exists for this email', 409, 'ALREADY_REGISTERED');
  }
}

export class IssueLockedError extends AppError {
  constructor(status: string) {
    super(`Issue can only be edited while open (current status: ${status})`, 409, 'ISSUE_LOCKED');
  }
}

export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(`Cannot move issue from ${from} to ${to}`, 409, 'INVALID_TRANSITION', { from, to });
  }
}

/**
 * Base for the three ways an OTP check fails.
 */
export abstract class OtpError extends AppError {
  protected constructor(message: string, code: string) {
    super(message, 400, code);
  }
}

export class ExpiredCodeError extends OtpError {
  constructor() {
    super('OTP expired.', 'OTP_EXPIRED');
  }
}

export class AlreadyConsumedError extends OtpError {
  constructor() {
    super('OTP has already been used.', 'OTP_ALREADY_CONSUMED');
  }
}

export class OtpMismatchError extends OtpError {
  constructor() {
    super('Invalid OTP.', 'OTP_MISMATCH');
  }
}
