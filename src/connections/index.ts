// Database
export { pool, migrate, rollback, connectDatabase, PgCrmStore } from './db';
export type { CrmStore, Queryable } from './db';

// Config - All configurations in one place
export { appConfig, logConfig, dbConfig } from './config';
