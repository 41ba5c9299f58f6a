// Postgres implementations (drizzle-orm over postgres.js)

export { createDatabase } from './db.js';
export type { Database, DatabaseConfig } from './db.js';
export { toRepositoryError, withStoreErrors } from './errors.js';
export * from './repositories/index.js';
export * as schema from './schema/index.js';
