export { createPool, connectDatabase } from './connection';
export { migrate, rollback } from './migrate';
