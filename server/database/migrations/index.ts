import type { Knex } from 'knex';
import * as ledgerSchema from './001_ledger_schema';

interface NamedMigration {
  name: string;
  migration: Knex.Migration;
}

// Registered in code so migrations load the same way under tsc output,
// tsx and vitest, with no directory scan or dynamic import.
const MIGRATIONS: NamedMigration[] = [
  { name: '001_ledger_schema', migration: ledgerSchema },
];

export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  async getMigrations() {
    return MIGRATIONS;
  },
  getMigrationName(entry) {
    return entry.name;
  },
  async getMigration(entry) {
    return entry.migration;
  },
};
