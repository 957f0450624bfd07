import { DatabaseError } from 'pg';
import { ConflictError } from '../utils/errors';

const UNIQUE_VIOLATION = '23505';

/**
 * Maps a unique-constraint violation onto a ConflictError carrying
 * `message`; every other error is rethrown unchanged.
 */
export function rethrowUniqueViolation(error: unknown, message: string): never {
  if (error instanceof DatabaseError && error.code === UNIQUE_VIOLATION) {
    throw new ConflictError(message);
  }
  throw error;
}
