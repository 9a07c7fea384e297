export const APP_NAME = 'Produce Ledger';
export const APP_VERSION = '1.0.0';

export const DEFAULT_API_PORT = 3001;
export const DEFAULT_DB_PORT = 5432;

export const USER_ROLES = {
  ADMIN: 'admin',
  USER: 'user',
} as const;

/** Counters kept in document_sequences. */
export const SEQUENCES = {
  STOCK_LOT: 'stock_lot',
  LEDGER_ENTRY: 'ledger_entry',
} as const;

export type SequenceName = (typeof SEQUENCES)[keyof typeof SEQUENCES];

export const DEFAULT_BOX_DEPOSIT = 200;
export const DEFAULT_RECENT_LIMIT = 20;
export const CONTACT_PATTERN = /^\d{10}$/;
export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
