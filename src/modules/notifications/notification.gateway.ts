import { Mailer, MailMessage } from './mailer';
import { MessageBroker } from './message-broker';
import {
  EmailContent,
  issueCreatedOwnerEmail,
  issueCreatedSupportEmail,
  issueResolvedEmail,
  issueUpdatedEmail,
  otpEmail,
} from './email.templates';
import { ItIssue, Staff } from '../../connections/db/models';
import { NOTIFICATION_KIND, NOTIFICATION_TOPIC, NotificationKind, OtpPurpose } from '../../constants';
import { logger, errorMeta } from '../../utils/logging';

/**
 * Wire format published on the notification topic
 */
export interface NotificationEvent {
  issue_id: number;
  kind: NotificationKind;
  timestamp: string;
  owner_id: string;
}

export type IssueOwner = Pick<Staff, 'id' | 'email' | 'first_name' | 'last_name' | 'branch'>;

export interface IssueNotice {
  kind: NotificationKind;
  issue: ItIssue;
  owner: IssueOwner;
}

export interface NotificationGatewayOptions {
  supportEmail?: string;
  websiteLink: string;
  otpTtlMinutes: number;
  now?: () => Date;
}

/**
 * Fans issue lifecycle events out to email and the pub/sub topic.
 */
export class NotificationGateway {
  private readonly now: () => Date;

  constructor(
    private readonly mailer: Mailer,
    private readonly broker: MessageBroker,
    private readonly options: NotificationGatewayOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Best effort: email and publish failures are logged, never thrown.
   */
  async notify(notice: IssueNotice): Promise<void> {
    const timestamp = this.now();
    const event: NotificationEvent = {
      issue_id: notice.issue.id,
      kind: notice.kind,
      timestamp: timestamp.toISOString(),
      owner_id: notice.owner.id,
    };

    await Promise.all([
      this.sendIssueEmails(notice, timestamp.getFullYear()),
      this.publish(event),
    ]);
  }

  /**
   * Rejects when the message could not be handed to the mail transport.
   */
  async sendOtp(
    email: string,
    recipient: Pick<Staff, 'first_name' | 'last_name'>,
    code: string,
    purpose: OtpPurpose
  ): Promise<void> {
    const content = otpEmail(recipient, code, purpose, this.options.otpTtlMinutes, this.now().getFullYear());
    await this.mailer.send({ to: email, ...content });
  }

  private buildIssueEmails(notice: IssueNotice, year: number): MailMessage[] {
    const { issue, owner } = notice;
    const link = this.options.websiteLink;
    const toOwner = (content: EmailContent): MailMessage => ({ to: owner.email, ...content });

    switch (notice.kind) {
      case NOTIFICATION_KIND.CREATED: {
        const messages = [toOwner(issueCreatedOwnerEmail(issue, owner, link, year))];
        if (this.options.supportEmail) {
          messages.push({
            to: this.options.supportEmail,
            ...issueCreatedSupportEmail(issue, owner, link, year),
          });
        }
        return messages;
      }
      case NOTIFICATION_KIND.RESOLVED:
        return [toOwner(issueResolvedEmail(issue, owner, link, year))];
      case NOTIFICATION_KIND.UPDATED:
        return [toOwner(issueUpdatedEmail(issue, owner, link, year))];
    }
  }

  private async sendIssueEmails(notice: IssueNotice, year: number): Promise<void> {
    const messages = this.buildIssueEmails(notice, year);
    const results = await Promise.allSettled(messages.map(message => this.mailer.send(message)));

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.error('[Notification] Email delivery failed', {
          issueId: notice.issue.id,
          kind: notice.kind,
          to: messages[index].to,
          ...errorMeta(result.reason),
        });
      }
    });
  }

  private async publish(event: NotificationEvent): Promise<void> {
    try {
      await this.broker.publish(NOTIFICATION_TOPIC, JSON.stringify(event));
    } catch (error) {
      logger.error('[Notification] Publish failed', {
        issueId: event.issue_id,
        kind: event.kind,
        ...errorMeta(error),
      });
    }
  }
}
