/**
 * Database errors
 *
 * Driver errors are wrapped so callers never depend on better-sqlite3 or pg
 * error shapes.
 */

export class DatabaseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatabaseError';
  }
}

export class UniqueViolationError extends DatabaseError {
  constructor(
    public readonly column: string,
    options?: { cause?: unknown }
  ) {
    super(`Unique constraint violated on ${column}`, options);
    this.name = 'UniqueViolationError';
  }
}

const SQLITE_UNIQUE = 'SQLITE_CONSTRAINT_UNIQUE';
const PG_UNIQUE = '23505';

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Normalize a driver error. `column` names the unique column a violation is
 * reported against.
 */
export function toDatabaseError(err: unknown, message: string, column = 'filename'): DatabaseError {
  if (err instanceof DatabaseError) {
    return err;
  }

  const code = errorCode(err);
  if (code === SQLITE_UNIQUE || code === PG_UNIQUE) {
    return new UniqueViolationError(column, { cause: err });
  }

  return new DatabaseError(message, { cause: err });
}
