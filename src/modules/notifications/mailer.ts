import nodemailer, { Transporter } from 'nodemailer';
import { AppConfig } from '../../connections/config/app.config';
import { logger } from '../../utils/logging';

export interface MailMessage {
  to: string | string[];
  subject: string;
  html: string;
}

export interface Mailer {
  send(message: MailMessage): Promise<void>;
}

export class NodemailerMailer implements Mailer {
  constructor(
    private readonly transporter: Transporter,
    private readonly from: string
  ) {}

  async send(message: MailMessage): Promise<void> {
    await this.transporter.sendMail({
      from: this.from,
      to: message.to,
      subject: message.subject,
      html: message.html,
    });
    logger.debug('[Mail] Sent', { to: message.to, subject: message.subject });
  }
}

/**
 * SMTP in normal operation; the JSON transport renders messages without sending them
 */
export const createMailer = (emailConfig: AppConfig['email']): Mailer => {
  const transporter: Transporter =
    emailConfig.backend === 'json'
      ? nodemailer.createTransport({ jsonTransport: true })
      : nodemailer.createTransport({
          host: emailConfig.host,
          port: emailConfig.port,
          secure: emailConfig.port === 465,
          auth: emailConfig.user
            ? { user: emailConfig.user, pass: emailConfig.pass }
            : undefined,
        });

  if (emailConfig.backend === 'smtp' && !emailConfig.user) {
    logger.warn('SMTP credentials are not configured, outgoing mail may be rejected', {
      host: emailConfig.host,
    });
  }

  return new NodemailerMailer(transporter, emailConfig.from);
};
