/**
 * Staff Role Constants
 * - user: regular staff, logs and follows their own issues
 * - support: IT support, works the issue queue
 * - admin: support plus staff administration
 */
export const STAFF_ROLE = {
  USER: 'user', // default
  SUPPORT: 'support',
  ADMIN: 'admin',
} as const;

export type StaffRole = typeof STAFF_ROLE[keyof typeof STAFF_ROLE];

export const STAFF_ROLES = [STAFF_ROLE.USER, STAFF_ROLE.SUPPORT, STAFF_ROLE.ADMIN] as const;

export const SUPPORT_ROLES: readonly StaffRole[] = [STAFF_ROLE.SUPPORT, STAFF_ROLE.ADMIN];

export const isSupportRole = (role: string): boolean =>
  SUPPORT_ROLES.some(supportRole => supportRole === role);

/**
 * Branch Constants
 */
export const BRANCH = {
  WESTLANDS: 'westlands',
  PARKLANDS: 'parklands',
  KOINANGE: 'koinange',
  INDUSTRIAL: 'industrial',
  KISUMU: 'kisumu',
  MOMBASA: 'mombasa',
  ELDORET: 'eldoret',
  HEADQUARTERS: 'headquarters', // default
} as const;

export type Branch = typeof BRANCH[keyof typeof BRANCH];

export const BRANCHES = [
  BRANCH.WESTLANDS,
  BRANCH.PARKLANDS,
  BRANCH.KOINANGE,
  BRANCH.INDUSTRIAL,
  BRANCH.KISUMU,
  BRANCH.MOMBASA,
  BRANCH.ELDORET,
  BRANCH.HEADQUARTERS,
] as const;
