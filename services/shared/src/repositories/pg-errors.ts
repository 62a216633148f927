import { UniqueViolationError } from '../utils/errors';

const UNIQUE_VIOLATION = '23505';

/** Translates a Postgres unique violation into UniqueViolationError; anything else is rethrown as is. */
export function rethrowUniqueViolation(error: unknown): never {
     if (typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION) {
          const constraint =
               'constraint' in error && typeof error.constraint === 'string' ? error.constraint : undefined;
          throw new UniqueViolationError(constraint);
     }
     throw error;
}
