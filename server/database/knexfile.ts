import type { Knex } from 'knex';
import { config } from '../config';
import { moduleLogger } from '../lib/logger';
import { migrationSource } from './migrations';

const log = moduleLogger('knex');

const shared: Pick<Knex.Config, 'migrations' | 'log'> = {
  migrations: {
    migrationSource,
    tableName: 'knex_migrations',
  },
  log: {
    warn: (message: unknown) => log.warn(String(message)),
    error: (message: unknown) => log.error(String(message)),
    deprecate: (method: string, alternative: string) =>
      log.warn(`${method} is deprecated, use ${alternative}`),
    debug: (message: unknown) => log.trace({ query: message }, 'knex debug'),
  },
};

function buildConfig(): Knex.Config {
  if (config.db.client === 'better-sqlite3') {
    // Single connection: SQLite serializes writers, and an in-memory
    // database only exists inside the connection that created it.
    return {
      ...shared,
      client: 'better-sqlite3',
      connection: { filename: config.db.filename },
      useNullAsDefault: true,
      pool: { min: 1, max: 1 },
    };
  }

  return {
    ...shared,
    client: 'pg',
    connection: {
      host: config.db.host,
      port: config.db.port,
      database: config.db.database,
      user: config.db.user,
      password: config.db.password,
    },
    pool: {
      min: 2,
      max: 10,
    },
  };
}

const knexConfig = buildConfig();

export default knexConfig;
