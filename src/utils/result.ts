import { DataUnavailableError, GridBotError } from '../errors';
import { errorMessage } from './formatError';

export type Result<T, E extends Error = GridBotError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends Error>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Runs an exchange read and folds a rejection into a DataUnavailableError
 * result, so callers branch on `ok` instead of catching.
 */
export async function attempt<T>(label: string, operation: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await operation());
  } catch (error) {
    if (error instanceof GridBotError) return fail(error);
    return fail(new DataUnavailableError(`${label}: ${errorMessage(error)}`, { cause: error }));
  }
}
