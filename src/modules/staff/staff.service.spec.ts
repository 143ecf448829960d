import jwt from 'jsonwebtoken';
import { StaffService } from './staff.service';
import { TokenService } from './token.service';
import { InMemoryRevokedTokenStore } from './revoked-token.store';
import { OtpService } from '../otp/otp.service';
import { NotificationGateway } from '../notifications/notification.gateway';
import { InMemoryMessageBroker } from '../notifications/message-broker';
import { InMemoryOtpRepository } from '../../../test/fakes/in-memory-otp.repository';
import { InMemoryStaffRepository } from '../../../test/fakes/in-memory-staff.repository';
import { RecordingMailer } from '../../../test/fakes/recording.mailer';
import { BRANCH, OTP_PURPOSE, STAFF_ROLE } from '../../constants';
import {
  AccountNotVerifiedError,
  AlreadyRegisteredError,
  AuthenticationError,
  DomainNotAllowedError,
  ForbiddenError,
  NotFoundError,
  OtpMismatchError,
  UnknownAccountError,
} from '../../utils/errors';

describe('StaffService', () => {
  const domain = '@paramount.co.ke';
  const email = 'jane@paramount.co.ke';

  let staffRepository: InMemoryStaffRepository;
  let otpRepository: InMemoryOtpRepository;
  let mailer: RecordingMailer;
  let tokens: TokenService;
  let service: StaffService;

  beforeEach(() => {
    staffRepository = new InMemoryStaffRepository();
    otpRepository = new InMemoryOtpRepository();
    mailer = new RecordingMailer();
    const gateway = new NotificationGateway(mailer, new InMemoryMessageBroker(), {
      websiteLink: 'http://localhost:5173',
      otpTtlMinutes: 5,
    });
    tokens = new TokenService(
      { secret: 'test-secret', accessTtlSeconds: 900, refreshTtlSeconds: 7 * 86400 },
      new InMemoryRevokedTokenStore()
    );
    service = new StaffService(
      staffRepository,
      new OtpService(otpRepository, { ttlMinutes: 5 }),
      gateway,
      tokens,
      domain
    );
  });

  const registerAndVerify = async (address: string = email) => {
    await service.register({ email: address, first_name: 'Jane', last_name: 'Wanjiku' });
    const result = await service.verifyAndIssueCredential(
      address,
      mailer.lastCodeFor(address),
      OTP_PURPOSE.REGISTRATION
    );
    return result.staff;
  };

  const login = async (address: string = email) => {
    await service.requestLogin(address);
    const result = await service.verifyAndIssueCredential(address, mailer.lastCodeFor(address), OTP_PURPOSE.LOGIN);
    if (result.purpose !== OTP_PURPOSE.LOGIN) {
      throw new Error('expected a login result');
    }
    return result;
  };

  describe('register', () => {
    it('rejects an email outside the staff domain', async () => {
      await expect(
        service.register({ email: 'jane@gmail.com', first_name: 'Jane', last_name: 'Wanjiku' })
      ).rejects.toBeInstanceOf(DomainNotAllowedError);
      expect(staffRepository.staff).toHaveLength(0);
      expect(mailer.sent).toHaveLength(0);
    });

    it('creates an unverified account and emails a registration code', async () => {
      const result = await service.register({
        email: 'Jane@Paramount.co.ke',
        first_name: 'Jane',
        last_name: 'Wanjiku',
        branch: BRANCH.KISUMU,
      });

      expect(result.otpSent).toBe(true);
      expect(result.staff).toMatchObject({
        email,
        first_name: 'Jane',
        last_name: 'Wanjiku',
        branch: 'kisumu',
        role: 'user',
        is_verified: false,
      });
      expect(mailer.sent).toHaveLength(1);
      expect(mailer.sent[0].to).toBe(email);
      expect(mailer.sent[0].subject).toBe('Your OTP Code');
      expect(otpRepository.records[0].purpose).toBe(OTP_PURPOSE.REGISTRATION);
    });

    it('refreshes an account that never verified and supersedes its old code', async () => {
      await service.register({ email, first_name: 'Jane', last_name: 'Wanjiku' });
      const firstCode = mailer.lastCodeFor(email);
      await service.register({ email, first_name: 'Janet', last_name: 'Wanjiku' });
      const secondCode = mailer.lastCodeFor(email);

      expect(staffRepository.staff).toHaveLength(1);
      expect(staffRepository.staff[0].first_name).toBe('Janet');
      if (firstCode !== secondCode) {
        await expect(
          service.verifyAndIssueCredential(email, firstCode, OTP_PURPOSE.REGISTRATION)
        ).rejects.toBeInstanceOf(OtpMismatchError);
      }
      await expect(
        service.verifyAndIssueCredential(email, secondCode, OTP_PURPOSE.REGISTRATION)
      ).resolves.toMatchObject({ purpose: 'registration' });
    });

    it('refuses an email that already has a verified account', async () => {
      await registerAndVerify();

      await expect(
        service.register({ email, first_name: 'Jane', last_name: 'Wanjiku' })
      ).rejects.toBeInstanceOf(AlreadyRegisteredError);
    });

    it('keeps the account and the code when the email cannot be sent', async () => {
      mailer.failWith = new Error('smtp down');

      const result = await service.register({ email, first_name: 'Jane', last_name: 'Wanjiku' });

      expect(result.otpSent).toBe(false);
      expect(staffRepository.staff).toHaveLength(1);
      expect(otpRepository.records).toHaveLength(1);
    });
  });

  describe('verifyAndIssueCredential', () => {
    it('marks the account verified on a registration code', async () => {
      const staff = await registerAndVerify();

      expect(staff.is_verified).toBe(true);
      expect(staffRepository.staff[0].is_verified).toBe(true);
    });

    it('rejects an unknown account before touching codes', async () => {
      await expect(
        service.verifyAndIssueCredential('ghost@paramount.co.ke', '123456', OTP_PURPOSE.LOGIN)
      ).rejects.toBeInstanceOf(UnknownAccountError);
    });

    it('surfaces the verifier error unchanged', async () => {
      await service.register({ email, first_name: 'Jane', last_name: 'Wanjiku' });
      const code = mailer.lastCodeFor(email);
      const wrong = code === '000000' ? '111111' : '000000';

      await expect(
        service.verifyAndIssueCredential(email, wrong, OTP_PURPOSE.REGISTRATION)
      ).rejects.toBeInstanceOf(OtpMismatchError);
      expect(staffRepository.staff[0].is_verified).toBe(false);
    });

    it('issues access and refresh tokens on a login code', async () => {
      const staff = await registerAndVerify();

      const result = await login();

      const access = jwt.verify(result.access, 'test-secret');
      const refresh = jwt.verify(result.refresh, 'test-secret');
      expect(access).toMatchObject({ sub: staff.id, role: 'user', token_type: 'access' });
      expect(refresh).toMatchObject({ sub: staff.id, role: 'user', token_type: 'refresh' });
      expect(result.staff.id).toBe(staff.id);
    });
  });

  describe('requestLogin', () => {
    it('rejects an unknown email', async () => {
      await expect(service.requestLogin('ghost@paramount.co.ke')).rejects.toBeInstanceOf(UnknownAccountError);
    });

    it('rejects an account that never verified', async () => {
      await service.register({ email, first_name: 'Jane', last_name: 'Wanjiku' });

      const attempt = service.requestLogin(email);

      await expect(attempt).rejects.toBeInstanceOf(AccountNotVerifiedError);
      await expect(attempt).rejects.toBeInstanceOf(UnknownAccountError);
    });

    it('emails a login code to a verified account', async () => {
      await registerAndVerify();

      await expect(service.requestLogin(email)).resolves.toEqual({ otpSent: true });
      expect(mailer.sent[mailer.sent.length - 1].subject).toBe('Your Login OTP');
    });
  });

  describe('resendOtp', () => {
    it('sends a registration code to an unverified account', async () => {
      await service.register({ email, first_name: 'Jane', last_name: 'Wanjiku' });

      await expect(service.resendOtp(email)).resolves.toEqual({ purpose: 'registration', otpSent: true });
    });

    it('sends a login code to a verified account', async () => {
      await registerAndVerify();

      await expect(service.resendOtp(email)).resolves.toEqual({ purpose: 'login', otpSent: true });
    });

    it('rejects an unknown email', async () => {
      await expect(service.resendOtp('ghost@paramount.co.ke')).rejects.toBeInstanceOf(UnknownAccountError);
    });
  });

  describe('sessions', () => {
    it('refreshes an access token', async () => {
      const staff = await registerAndVerify();
      const { refresh } = await login();

      const { access } = await service.refreshSession(refresh);

      await expect(service.resolveSession(access)).resolves.toMatchObject({ id: staff.id });
    });

    it('refuses a refresh token after logout', async () => {
      const staff = await registerAndVerify();
      const { refresh } = await login();

      await service.logout(refresh, staff.id);

      await expect(service.refreshSession(refresh)).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('refuses to revoke another account\'s refresh token', async () => {
      await registerAndVerify();
      const { refresh } = await login();
      const other = staffRepository.seed({ email: 'john@paramount.co.ke' });

      await expect(service.logout(refresh, other.id)).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('does not accept a refresh token as an access token', async () => {
      await registerAndVerify();
      const { refresh } = await login();

      await expect(service.resolveSession(refresh)).rejects.toBeInstanceOf(AuthenticationError);
    });

    it('does not accept an access token for refresh', async () => {
      await registerAndVerify();
      const { access } = await login();

      await expect(service.refreshSession(access)).rejects.toBeInstanceOf(AuthenticationError);
    });
  });

  describe('profiles', () => {
    it('updates names and branch', async () => {
      const staff = await registerAndVerify();

      const updated = await service.updateProfile(staff.id, { first_name: 'Janet', branch: BRANCH.MOMBASA });

      expect(updated).toMatchObject({ first_name: 'Janet', last_name: 'Wanjiku', branch: 'mombasa' });
    });

    it('reports a missing account', async () => {
      await expect(service.getProfile('00000000-0000-4000-8000-000000000000')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('lets an admin change a role', async () => {
      const staff = await registerAndVerify();
      const admin = staffRepository.seed({ email: 'admin@paramount.co.ke', role: STAFF_ROLE.ADMIN });

      const updated = await service.updateStaff(staff.id, { role: STAFF_ROLE.SUPPORT }, admin.id);

      expect(updated.role).toBe('support');
    });

    it('pages through staff', async () => {
      staffRepository.seed({ email: 'a@paramount.co.ke', first_name: 'Amina' });
      staffRepository.seed({ email: 'b@paramount.co.ke', first_name: 'Brian' });
      staffRepository.seed({ email: 'c@paramount.co.ke', first_name: 'Chege' });

      const page = await service.listStaff(2, 2);

      expect(page.total).toBe(3);
      expect(page.rows.map(s => s.first_name)).toEqual(['Chege']);
    });
  });
});
