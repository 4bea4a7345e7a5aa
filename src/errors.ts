/**
 * Error kinds shared by the adapters, the sync engine and the run controller.
 */

// ============================================================================
// Base Class
// ============================================================================

export type SyncErrorCode =
  | "CONFIGURATION_ERROR"
  | "TRANSPORT_ERROR"
  | "NOT_FOUND"
  | "CORRUPT_INDEX"
  | "STORE_WRITE_ERROR";

export abstract class SyncError extends Error {
  abstract readonly code: SyncErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============================================================================
// Error Classes
// ============================================================================

export class ConfigurationError extends SyncError {
  readonly code = "CONFIGURATION_ERROR" as const;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.details = details;
  }
}

export class TransportError extends SyncError {
  readonly code = "TRANSPORT_ERROR" as const;
  status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.status = options?.status;
  }
}

export class NotFoundError extends SyncError {
  readonly code = "NOT_FOUND" as const;
}

export class CorruptIndexError extends SyncError {
  readonly code = "CORRUPT_INDEX" as const;
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.details = details;
  }
}

export class StoreWriteError extends SyncError {
  readonly code = "STORE_WRITE_ERROR" as const;
  key: string;

  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.key = key;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

/**
 * Render any thrown value as a one-line message, prefixed with the error code
 * when it is one of ours.
 */
export function describeError(error: unknown): string {
  if (error instanceof SyncError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
