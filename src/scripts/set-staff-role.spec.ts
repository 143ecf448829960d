import { setStaffRole } from './set-staff-role';
import { InMemoryStaffRepository } from '../../test/fakes/in-memory-staff.repository';
import { ZodError } from 'zod';

describe('setStaffRole', () => {
  let repository: InMemoryStaffRepository;

  beforeEach(() => {
    repository = new InMemoryStaffRepository();
  });

  it('promotes an existing account', async () => {
    const staff = repository.seed({ email: 'peter@paramount.co.ke' });

    await setStaffRole(repository, ['Peter@Paramount.co.ke', 'support']);

    await expect(repository.findById(staff.id)).resolves.toMatchObject({ role: 'support' });
  });

  it('fails for an unknown email', async () => {
    await expect(setStaffRole(repository, ['nobody@paramount.co.ke', 'admin'])).rejects.toThrow(
      'No staff account for nobody@paramount.co.ke'
    );
  });

  it('rejects an unknown role', async () => {
    repository.seed({ email: 'peter@paramount.co.ke' });

    await expect(setStaffRole(repository, ['peter@paramount.co.ke', 'root'])).rejects.toBeInstanceOf(ZodError);
  });
});
