import { Pool } from 'pg';
import { AppConfig } from './connections/config/app.config';
import { OtpRepository, PgOtpRepository } from './modules/otp/otp.repository';
import { OtpService } from './modules/otp/otp.service';
import { PgStaffRepository, StaffRepository } from './modules/staff/staff.repository';
import { RevokedTokenStore } from './modules/staff/revoked-token.store';
import { TokenService } from './modules/staff/token.service';
import { StaffService } from './modules/staff/staff.service';
import { IssueRepository, PgIssueRepository } from './modules/issues/issues.repository';
import { IssueService } from './modules/issues/issues.service';
import { Mailer } from './modules/notifications/mailer';
import { MessageBroker } from './modules/notifications/message-broker';
import { NotificationGateway } from './modules/notifications/notification.gateway';
import { AttachmentStorage, LocalAttachmentStorage } from './modules/upload/localStorage.service';

export interface Repositories {
  staff: StaffRepository;
  otp: OtpRepository;
  issues: IssueRepository;
}

export interface AppDependencies {
  repositories: Repositories;
  broker: MessageBroker;
  revokedTokens: RevokedTokenStore;
  mailer: Mailer;
  storage?: AttachmentStorage;
  checkHealth: () => Promise<void>;
}

/**
 * Everything the HTTP app and the relay need, wired once at startup
 */
export interface AppContext {
  config: AppConfig;
  broker: MessageBroker;
  otpService: OtpService;
  staffService: StaffService;
  issueService: IssueService;
  gateway: NotificationGateway;
  checkHealth: () => Promise<void>;
}

export const createPgRepositories = (pool: Pool): Repositories => ({
  staff: new PgStaffRepository(pool),
  otp: new PgOtpRepository(pool),
  issues: new PgIssueRepository(pool),
});

export const createServices = (config: AppConfig, deps: AppDependencies): AppContext => {
  const { repositories } = deps;

  const gateway = new NotificationGateway(deps.mailer, deps.broker, {
    supportEmail: config.staff.supportEmail,
    websiteLink: config.staff.websiteLink,
    otpTtlMinutes: config.otp.ttlMinutes,
  });

  const otpService = new OtpService(repositories.otp, { ttlMinutes: config.otp.ttlMinutes });
  const tokens = new TokenService(config.jwt, deps.revokedTokens);

  const staffService = new StaffService(
    repositories.staff,
    otpService,
    gateway,
    tokens,
    config.staff.emailDomain
  );

  const issueService = new IssueService(
    repositories.issues,
    repositories.staff,
    deps.storage ?? new LocalAttachmentStorage(config.uploadDir),
    gateway
  );

  return {
    config,
    broker: deps.broker,
    otpService,
    staffService,
    issueService,
    gateway,
    checkHealth: deps.checkHealth,
  };
};
