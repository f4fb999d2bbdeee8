import type { ZodIssue } from 'zod';

/**
 * The cursor store could not be reached. Callers own the retry policy;
 * nothing in this service retries on their behalf.
 */
export class StorageUnavailableError extends Error {
  readonly code = 'STORAGE_UNAVAILABLE';
  readonly status_code = 503;

  constructor(message = 'Cursor store unavailable', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageUnavailableError';
  }
}

/** Input rejected before anything was written. */
export class ConstraintViolationError extends Error {
  readonly code = 'CONSTRAINT_VIOLATION';
  readonly status_code = 400;
  readonly details: ZodIssue[];

  constructor(message: string, details: ZodIssue[] = []) {
    super(message);
    this.name = 'ConstraintViolationError';
    this.details = details;
  }
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'EAI_AGAIN',
  // admin_shutdown, crash_shutdown, cannot_connect_now
  '57P01',
  '57P02',
  '57P03',
]);

function get_code(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * True for failures that mean the database is unreachable, as opposed to a
 * statement the database rejected.
 */
export function is_connection_error(error: unknown): boolean {
  const code = get_code(error);
  if (code) {
    // SQLSTATE class 08: connection exception
    return CONNECTION_ERROR_CODES.has(code) || /^08[0-9A-Z]{3}$/.test(code);
  }
  if (error instanceof Error) {
    return (
      error.message.includes('Connection terminated') ||
      error.message.includes('timeout exceeded when trying to connect')
    );
  }
  return false;
}

export function to_storage_error(error: unknown): unknown {
  if (error instanceof StorageUnavailableError || !is_connection_error(error)) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new StorageUnavailableError(`Cursor store unavailable: ${reason}`, { cause: error });
}
