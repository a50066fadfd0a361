/**
 * Application error hierarchy.
 * Every error the monitor raises on purpose is an AppError with a stable code,
 * so callers and log queries can match on `code` instead of message text.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Fingerprint store or notification ledger read/write failure. */
export class StorageError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('STORAGE_ERROR', message, details, options);
  }
}

/** A store, sink or discovery call that did not settle in time. */
export class TimeoutError extends StorageError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, { operation, timeoutMs });
  }
}

/** Notification could not be delivered. Never aborts a cycle. */
export class TransportError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('TRANSPORT_ERROR', message, details, options);
  }
}

/** Candidate keys could not be discovered; the cycle is abandoned before any key. */
export class DiscoveryError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super('DISCOVERY_ERROR', message, details, options);
  }
}

/** Ledger state that should be impossible. Stops the cycle to avoid double alerts. */
export class InvariantViolation extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVARIANT_VIOLATION', message, details);
  }
}

export class CycleInProgressError extends AppError {
  constructor() {
    super('CYCLE_IN_PROGRESS', 'A monitoring cycle is already running');
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_ERROR', message, details);
  }
}

/** Structured log fields for any thrown value. */
export function errorFields(err: unknown): Record<string, unknown> {
  if (err instanceof AppError) {
    return {
      error: err.message,
      errorName: err.name,
      errorCode: err.code,
      ...(err.details && { errorDetails: err.details }),
    };
  }
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name };
  }
  return { error: String(err) };
}
