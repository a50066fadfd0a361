import type { PostgrestError } from '@supabase/supabase-js';
import { StorageError, TimeoutError } from '../errors.js';

/** Abort signal for one store call; the caller checks `aborted` when mapping errors. */
export function storeSignal(timeoutMs: number): AbortSignal {
  return AbortSignal.timeout(timeoutMs);
}

/** Map a PostgREST error into the monitor's error taxonomy. */
export function toStorageError(
  operation: string,
  error: PostgrestError,
  signal: AbortSignal,
  timeoutMs: number
): StorageError {
  if (signal.aborted) return new TimeoutError(operation, timeoutMs);
  return new StorageError(`Failed to ${operation}: ${error.message}`, {
    operation,
    ...(error.code && { pgCode: error.code }),
  });
}
