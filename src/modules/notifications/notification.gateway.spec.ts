import { NotificationEvent, NotificationGateway, IssueOwner } from './notification.gateway';
import { InMemoryMessageBroker } from './message-broker';
import { escapeHtml } from './email.templates';
import { RecordingMailer } from '../../../test/fakes/recording.mailer';
import { ItIssue } from '../../connections/db/models';
import { BRANCH, NOTIFICATION_KIND, NOTIFICATION_TOPIC, OTP_PURPOSE } from '../../constants';

describe('NotificationGateway', () => {
  const now = new Date('2026-03-04T08:15:00.000Z');

  const owner: IssueOwner = {
    id: '7d0b5f0e-1f7e-4c3a-9a53-2f3a1f0c9b11',
    email: 'jane@paramount.co.ke',
    first_name: 'Jane',
    last_name: 'Wanjiku',
    branch: BRANCH.WESTLANDS,
  };

  const issue: ItIssue = {
    id: 42,
    owner_id: owner.id,
    title: 'Printer <offline>',
    description: 'The second floor printer is offline',
    category: 'hardware',
    priority: 'high',
    method_of_logging: 'walk_in',
    attachment: null,
    status: 'open',
    work_done: null,
    recommendation: null,
    resolved_at: null,
    created_at: now,
    updated_at: now,
  };

  let mailer: RecordingMailer;
  let broker: InMemoryMessageBroker;
  let published: string[];

  const createGateway = (supportEmail?: string) =>
    new NotificationGateway(mailer, broker, {
      supportEmail,
      websiteLink: 'http://desk.test',
      otpTtlMinutes: 5,
      now: () => now,
    });

  beforeEach(async () => {
    mailer = new RecordingMailer();
    broker = new InMemoryMessageBroker();
    published = [];
    await broker.subscribe(NOTIFICATION_TOPIC, payload => published.push(payload));
  });

  describe('notify', () => {
    it('emails the owner and the support desk and publishes the event for a new issue', async () => {
      await createGateway('it-support@paramount.co.ke').notify({
        kind: NOTIFICATION_KIND.CREATED,
        issue,
        owner,
      });

      expect(mailer.sent.map(m => [m.to, m.subject])).toEqual([
        ['jane@paramount.co.ke', 'Issue #42 received'],
        ['it-support@paramount.co.ke', 'New issue #42: Printer <offline>'],
      ]);
      expect(mailer.sent[1].html).toContain('Printer &lt;offline&gt;');
      expect(mailer.sent[1].html).toContain('(jane@paramount.co.ke, Westlands)');

      const expected: NotificationEvent = {
        issue_id: 42,
        kind: 'CREATED',
        timestamp: '2026-03-04T08:15:00.000Z',
        owner_id: owner.id,
      };
      expect(published).toHaveLength(1);
      expect(JSON.parse(published[0])).toEqual(expected);
    });

    it('only emails the owner when no support address is configured', async () => {
      await createGateway().notify({ kind: NOTIFICATION_KIND.CREATED, issue, owner });

      expect(mailer.sent.map(m => m.to)).toEqual(['jane@paramount.co.ke']);
    });

    it('sends the resolution notes when an issue is resolved', async () => {
      await createGateway('it-support@paramount.co.ke').notify({
        kind: NOTIFICATION_KIND.RESOLVED,
        issue: { ...issue, status: 'resolved', work_done: 'Replaced toner', recommendation: null },
        owner,
      });

      expect(mailer.sent).toHaveLength(1);
      expect(mailer.sent[0].subject).toBe('Issue #42 resolved');
      expect(mailer.sent[0].html).toContain('<p><strong>Work done:</strong> Replaced toner</p>');
      expect(mailer.sent[0].html).toContain('<p><strong>Recommendation:</strong> None</p>');
      expect(mailer.sent[0].html).toContain('<p><strong>Status:</strong> Resolved</p>');
      expect(JSON.parse(published[0]).kind).toBe('RESOLVED');
    });

    it('publishes even when email delivery fails', async () => {
      mailer.failWith = new Error('smtp down');

      await expect(
        createGateway().notify({ kind: NOTIFICATION_KIND.UPDATED, issue, owner })
      ).resolves.toBeUndefined();

      expect(mailer.sent).toHaveLength(0);
      expect(JSON.parse(published[0])).toEqual({
        issue_id: 42,
        kind: 'UPDATED',
        timestamp: '2026-03-04T08:15:00.000Z',
        owner_id: owner.id,
      });
    });

    it('still emails when publishing fails', async () => {
      jest.spyOn(broker, 'publish').mockRejectedValue(new Error('broker down'));

      await expect(
        createGateway().notify({ kind: NOTIFICATION_KIND.UPDATED, issue, owner })
      ).resolves.toBeUndefined();

      expect(mailer.sent.map(m => m.subject)).toEqual(['Issue #42 updated']);
    });
  });

  describe('sendOtp', () => {
    it('renders the registration code email', async () => {
      await createGateway().sendOtp(owner.email, owner, '012345', OTP_PURPOSE.REGISTRATION);

      expect(mailer.sent).toHaveLength(1);
      expect(mailer.sent[0].to).toBe('jane@paramount.co.ke');
      expect(mailer.sent[0].subject).toBe('Your OTP Code');
      expect(mailer.sent[0].html).toContain('The code expires in 5 minutes.');
      expect(mailer.sent[0].html).toContain('&copy; 2026 IT Support Desk');
      expect(mailer.lastCodeFor(owner.email)).toBe('012345');
    });

    it('uses the login subject for login codes', async () => {
      await createGateway().sendOtp(owner.email, owner, '999999', OTP_PURPOSE.LOGIN);

      expect(mailer.sent[0].subject).toBe('Your Login OTP');
    });

    it('rejects when the mail transport fails', async () => {
      mailer.failWith = new Error('smtp down');

      await expect(
        createGateway().sendOtp(owner.email, owner, '123456', OTP_PURPOSE.LOGIN)
      ).rejects.toThrow('smtp down');
    });
  });

  describe('escapeHtml', () => {
    it('escapes markup characters', () => {
      expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
        '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;'
      );
    });
  });
});
