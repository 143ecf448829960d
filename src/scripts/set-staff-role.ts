import { z } from 'zod';
import { createPool, loadConfig } from '../connections';
import { PgStaffRepository, StaffRepository } from '../modules/staff/staff.repository';
import { normalizeEmail } from '../modules/staff/staff.service';
import { STAFF_ROLES } from '../constants';
import { auditLog, errorMeta, logger } from '../utils/logging';

const argsSchema = z.tuple([z.string().email(), z.enum(STAFF_ROLES)]);

/**
 * Usage: npm run staff:role -- <email> <user|support|admin>
 */
export const setStaffRole = async (repository: StaffRepository, argv: string[]): Promise<void> => {
  const [rawEmail, role] = argsSchema.parse(argv);
  const email = normalizeEmail(rawEmail);

  const staff = await repository.findByEmail(email);
  if (!staff) {
    throw new Error(`No staff account for ${email}`);
  }

  await repository.update(staff.id, { role });
  auditLog('STAFF_ROLE_CHANGED', { staffId: staff.id, email, from: staff.role, to: role, via: 'cli' });
  logger.info(`${email} is now ${role}`);
};

if (require.main === module) {
  const pool = createPool(loadConfig().db);

  setStaffRole(new PgStaffRepository(pool), process.argv.slice(2))
    .catch(error => {
      logger.error('Could not change staff role', errorMeta(error));
      process.exitCode = 1;
    })
    .finally(() => pool.end());
}
