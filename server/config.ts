// =============================================================
// File: server/config.ts
// Description: Typed runtime settings read from the environment
//              (.env loaded through dotenv). Every other module
//              reads configuration from here, never process.env.
// =============================================================

import dotenv from 'dotenv';
import path from 'path';
import { DEFAULT_API_PORT, DEFAULT_BOX_DEPOSIT, DEFAULT_DB_PORT } from '../shared/constants';

dotenv.config({ path: path.resolve(__dirname, '../.env') });

export type DbClient = 'pg' | 'better-sqlite3';

export interface AppConfig {
  env: string;
  api: {
    host: string;
    port: number;
  };
  db: {
    client: DbClient;
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    filename: string;
  };
  auth: {
    jwtSecret: string;
  };
  ledger: {
    defaultBoxDeposit: number;
    allowDirectSaleEdit: boolean;
  };
  logLevel: string;
}

function parseDbClient(value: string | undefined): DbClient {
  if (!value || value === 'pg' || value === 'postgres') return 'pg';
  if (value === 'better-sqlite3' || value === 'sqlite') return 'better-sqlite3';
  throw new Error(`Unsupported DB_CLIENT "${value}". Use pg or better-sqlite3`);
}

function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Expected a number but got "${value}"`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const nodeEnv = env.NODE_ENV || 'development';
  return {
    env: nodeEnv,
    api: {
      host: env.API_HOST || '0.0.0.0',
      port: parseNumber(env.API_PORT, DEFAULT_API_PORT),
    },
    db: {
      client: parseDbClient(env.DB_CLIENT),
      host: env.DB_HOST || 'localhost',
      port: parseNumber(env.DB_PORT, DEFAULT_DB_PORT),
      database: env.DB_NAME || 'produce_ledger',
      user: env.DB_USER || 'postgres',
      password: env.DB_PASSWORD || '',
      filename: env.DB_FILENAME || path.resolve(__dirname, '../data/ledger.sqlite3'),
    },
    auth: {
      jwtSecret: env.JWT_SECRET || '',
    },
    ledger: {
      defaultBoxDeposit: parseNumber(env.DEFAULT_BOX_DEPOSIT, DEFAULT_BOX_DEPOSIT),
      allowDirectSaleEdit: parseBool(env.ALLOW_DIRECT_SALE_EDIT, false),
    },
    logLevel: env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),
  };
}

export const config = loadConfig();
