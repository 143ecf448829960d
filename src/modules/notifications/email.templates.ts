import { ItIssue, Staff } from '../../connections/db/models';
import { ISSUE_CATEGORY_LABELS, OTP_PURPOSE, OtpPurpose } from '../../constants';

export interface EmailContent {
  subject: string;
  html: string;
}

type Recipient = Pick<Staff, 'first_name' | 'last_name'>;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, char => HTML_ESCAPES[char]);

const humanize = (value: string): string =>
  value
    .split('_')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');

const layout = (heading: string, body: string, year: number): string => `
    <div style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto; padding: 20px;">
      <h2 style="color: #333; border-bottom: 2px solid #1f4e79; padding-bottom: 10px;">${heading}</h2>
      ${body}
      <p style="color: #999; font-size: 12px; margin-top: 30px;">&copy; ${year} IT Support Desk</p>
    </div>
  `;

const issueSummary = (issue: ItIssue): string => `
      <div style="background: #f5f5f5; padding: 15px; border-radius: 5px; margin: 20px 0;">
        <p><strong>Issue:</strong> #${issue.id} ${escapeHtml(issue.title)}</p>
        <p><strong>Category:</strong> ${ISSUE_CATEGORY_LABELS[issue.category]}</p>
        <p><strong>Priority:</strong> ${humanize(issue.priority)}</p>
        <p><strong>Status:</strong> ${humanize(issue.status)}</p>
      </div>
  `;

const issueLink = (issue: ItIssue, websiteLink: string): string =>
  `<p><a href="${websiteLink}/issues/${issue.id}" style="color: #1f4e79;">View the issue</a></p>`;

export const otpEmail = (
  recipient: Recipient,
  code: string,
  purpose: OtpPurpose,
  ttlMinutes: number,
  year: number
): EmailContent => {
  const isRegistration = purpose === OTP_PURPOSE.REGISTRATION;
  const subject = isRegistration ? 'Your OTP Code' : 'Your Login OTP';
  const intro = isRegistration
    ? 'Use the code below to verify your email address.'
    : 'Use the code below to sign in.';

  return {
    subject,
    html: layout(
      subject,
      `
      <p>Hello <strong>${escapeHtml(recipient.first_name)}</strong>,</p>
      <p>${intro}</p>
      <p style="font-size: 28px; letter-spacing: 6px; font-weight: bold; color: #1f4e79;">${code}</p>
      <p>The code expires in ${ttlMinutes} minutes. If you did not request it, ignore this email.</p>
      `,
      year
    ),
  };
};

export const issueCreatedOwnerEmail = (
  issue: ItIssue,
  owner: Recipient,
  websiteLink: string,
  year: number
): EmailContent => ({
  subject: `Issue #${issue.id} received`,
  html: layout(
    'We received your issue',
    `
      <p>Hello <strong>${escapeHtml(owner.first_name)}</strong>,</p>
      <p>Your issue has been logged and IT support will pick it up shortly.</p>
      ${issueSummary(issue)}
      ${issueLink(issue, websiteLink)}
    `,
    year
  ),
});

export const issueCreatedSupportEmail = (
  issue: ItIssue,
  owner: Recipient & Pick<Staff, 'email' | 'branch'>,
  websiteLink: string,
  year: number
): EmailContent => ({
  subject: `New issue #${issue.id}: ${issue.title}`,
  html: layout(
    'New issue logged',
    `
      <p><strong>${escapeHtml(owner.first_name)} ${escapeHtml(owner.last_name)}</strong>
        (${escapeHtml(owner.email)}, ${humanize(owner.branch)}) logged a new issue.</p>
      ${issueSummary(issue)}
      <p style="white-space: pre-wrap;">${escapeHtml(issue.description)}</p>
      ${issueLink(issue, websiteLink)}
    `,
    year
  ),
});

export const issueUpdatedEmail = (
  issue: ItIssue,
  owner: Recipient,
  websiteLink: string,
  year: number
): EmailContent => ({
  subject: `Issue #${issue.id} updated`,
  html: layout(
    'Your issue was updated',
    `
      <p>Hello <strong>${escapeHtml(owner.first_name)}</strong>,</p>
      ${issueSummary(issue)}
      ${issueLink(issue, websiteLink)}
    `,
    year
  ),
});

export const issueResolvedEmail = (
  issue: ItIssue,
  owner: Recipient,
  websiteLink: string,
  year: number
): EmailContent => ({
  subject: `Issue #${issue.id} resolved`,
  html: layout(
    'Your issue has been resolved',
    `
      <p>Hello <strong>${escapeHtml(owner.first_name)}</strong>,</p>
      ${issueSummary(issue)}
      <p><strong>Work done:</strong> ${escapeHtml(issue.work_done ?? 'Not recorded')}</p>
      <p><strong>Recommendation:</strong> ${escapeHtml(issue.recommendation ?? 'None')}</p>
      ${issueLink(issue, websiteLink)}
    `,
    year
  ),
});
