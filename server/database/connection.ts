import knex, { Knex } from 'knex';
import { types } from 'pg';
import config from './knexfile';
import { moduleLogger } from '../lib/logger';

const log = moduleLogger('db');

// DATE columns come back as 'YYYY-MM-DD' strings instead of local-midnight Dates
const PG_DATE_OID = 1082;
types.setTypeParser(PG_DATE_OID, (value: string) => value);

let db: Knex | null = null;

export function getDb(): Knex {
  if (!db) {
    db = knex(config);
  }
  return db;
}

export async function initializeDb(): Promise<void> {
  const database = getDb();

  try {
    await database.raw('SELECT 1');
    log.info({ client: config.client }, 'Connected to ledger store');
  } catch (error) {
    log.error({ err: error }, 'Failed to connect to ledger store');
    throw error;
  }

  const [batch, applied] = await database.migrate.latest();
  if (applied.length > 0) {
    log.info({ batch, migrations: applied }, 'Migrations applied');
  }
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
    log.info('Connection closed');
  }
}
