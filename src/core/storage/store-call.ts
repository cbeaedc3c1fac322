import { transientError } from '../auth-error.js';

/**
 * Run one storage call. Driver and network failures become `transient_dependency`;
 * AuthErrors thrown by the adapter pass through unchanged.
 */
export async function storeCall<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw transientError(`storage.${operation} failed`, err);
  }
}
