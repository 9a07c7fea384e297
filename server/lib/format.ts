export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function round4(n: number): number {
  return Math.round(n * 10000) / 10000;
}

/** pg hands back NUMERIC and COUNT as strings, SQLite as numbers. */
export function parseNum(val: unknown): number {
  if (typeof val === 'number') return Number.isFinite(val) ? val : 0;
  if (typeof val === 'string') return parseFloat(val) || 0;
  return 0;
}

export function parseCount(val: unknown): number {
  return Math.trunc(parseNum(val));
}

export function toDateString(val: unknown): string {
  if (val instanceof Date) return val.toISOString().slice(0, 10);
  return String(val ?? '');
}

export function toTimestamp(val: unknown): string {
  if (val instanceof Date) return val.toISOString();
  return String(val ?? '');
}

export function toNullableTimestamp(val: unknown): string | null {
  return val === null || val === undefined ? null : toTimestamp(val);
}

export function today(): string {
  return new Date().toISOString().slice(0, 10);
}
