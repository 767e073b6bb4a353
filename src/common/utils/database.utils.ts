import { QueryFailedError } from 'typeorm';

// Driver error codes for a violated foreign key
const POSTGRES_FOREIGN_KEY_VIOLATION = '23503';
const SQLITE_FOREIGN_KEY_VIOLATION = 'SQLITE_CONSTRAINT_FOREIGNKEY';

export function driverErrorCode(error: unknown): string | undefined {
  if (!(error instanceof QueryFailedError)) return undefined;
  const driverError: unknown = error.driverError;
  if (typeof driverError === 'object' && driverError !== null && 'code' in driverError) {
    return typeof driverError.code === 'string' ? driverError.code : undefined;
  }
  return undefined;
}

export function isForeignKeyViolation(error: unknown): boolean {
  const code = driverErrorCode(error);
  return code === POSTGRES_FOREIGN_KEY_VIOLATION || code === SQLITE_FOREIGN_KEY_VIOLATION;
}

/** AVG() comes back as a number from SQLite and as a numeric string from PostgreSQL. */
export function toAverage(raw: string | number | null): number | null {
  if (raw === null) return null;
  const value = typeof raw === 'number' ? raw : Number.parseFloat(raw);
  return Number.isNaN(value) ? null : value;
}

// Pair with `ESCAPE '\\'` so a user-supplied % or _ matches literally.
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}
