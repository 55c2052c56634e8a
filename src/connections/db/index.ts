export { pool, connectDatabase } from './connection';
export { migrate, rollback } from './migrate';
export { PgCrmStore } from './store';
export type { CrmStore, Queryable } from './store';
