/**
 * Error types for differential namespaces and their stores.
 * Every error carries a code so callers can branch without parsing messages.
 */

import { toHex } from '../utils/bytes.js';

export type DiffErrorCode =
  | 'CONFLICTING_KEY'
  | 'HASHING_FAILED'
  | 'ENCODING_FAILED'
  | 'DECODING_FAILED'
  | 'INVALID_OBJECT_ID'
  | 'INVALID_OPTIONS'
  | 'NAMESPACE_NOT_FOUND'
  | 'MISSING_PAYLOAD'
  | 'APPLY_FAILED'
  | 'CANCELLED'
  | 'QUEUE_CLOSED'
  | 'STORAGE_ERROR'
  | 'TRANSACTION_CLOSED'
  | 'READ_ONLY_TRANSACTION'
  | 'STORE_CLOSED'
  | 'UNKNOWN';

export interface DiffErrorDetails {
  /** Error code for programmatic handling */
  code: DiffErrorCode;
  /** Human-readable message */
  message: string;
  /** Namespace the error was raised in */
  namespace?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: unknown;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class DiffError extends Error {
  readonly code: DiffErrorCode;
  readonly namespace?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: DiffErrorDetails) {
    super(details.message);
    this.name = 'DiffError';
    this.code = details.code;
    this.namespace = details.namespace;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause !== undefined) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    if ('captureStackTrace' in Error) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Format error for log output and operator consumption
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.namespace) {
      parts.push(`Namespace: ${this.namespace}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  /**
   * Convert to JSON for structured error output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      namespace: this.namespace,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Raised when a value cannot be hashed: cycles, functions, symbols, invalid dates.
 */
export class HashingError extends DiffError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super({
      code: 'HASHING_FAILED',
      message: `Cannot hash value at ${path}: ${reason}`,
      suggestion: 'Stage plain data (objects, arrays, strings, numbers, dates, byte arrays).',
      context: { path },
    });
    this.name = 'HashingError';
    this.path = path;
  }
}

/**
 * Raised when conflict tracking is enabled and an ID is staged twice
 * with different content in the same epoch.
 */
export class ConflictingKeyError extends DiffError {
  readonly id: Uint8Array;

  constructor(namespace: string, id: Uint8Array, epoch: number) {
    super({
      code: 'CONFLICTING_KEY',
      message: 'Multiple objects with the same ID were staged in the same conflict-tracking epoch',
      namespace,
      suggestion: 'Check the source for duplicate IDs, or re-enable conflict tracking to start a new epoch.',
      context: { id: toHex(id), epoch },
    });
    this.name = 'ConflictingKeyError';
    this.id = id;
  }
}

/**
 * A pending hash without its payload. This is corrupted state, not a
 * runtime failure of a single item, and aborts the whole apply run.
 */
export class InconsistentStateError extends DiffError {
  constructor(namespace: string, id: Uint8Array, hash: Uint8Array) {
    super({
      code: 'MISSING_PAYLOAD',
      message: 'Pending entry has no payload',
      namespace,
      suggestion: 'The namespace is corrupted; delete it and re-stage from the source.',
      context: {
        id: toHex(id),
        hash: toHex(hash),
      },
    });
    this.name = 'InconsistentStateError';
  }
}

/** One failed item of an apply run */
export interface ApplyFailure {
  id: Uint8Array;
  error: unknown;
}

/** Why an apply run stopped early */
export interface ApplyCancellation {
  reason: unknown;
}

/**
 * Aggregated outcome of an apply run that had per-item failures or was cancelled.
 * Items that succeeded in the same run are promoted regardless.
 */
export class ApplyError extends DiffError {
  readonly failures: readonly ApplyFailure[];
  readonly cancelled?: ApplyCancellation;

  constructor(namespace: string, failures: readonly ApplyFailure[], cancelled?: ApplyCancellation) {
    const parts: string[] = [];
    if (failures.length > 0) {
      parts.push(`${failures.length} item(s) failed to apply`);
    }
    if (cancelled) {
      parts.push('apply was cancelled');
    }

    super({
      code: 'APPLY_FAILED',
      message: parts.join('; '),
      namespace,
      suggestion: failures.length > 0 ? 'Failed items remain pending; fix the cause and apply again.' : undefined,
      context: {
        failed: failures.map((f) => toHex(f.id)),
        cancelled: cancelled !== undefined,
      },
    });
    this.name = 'ApplyError';
    this.failures = failures;
    this.cancelled = cancelled;
  }

  /** IDs that are still pending because their callback failed */
  get failedIds(): Uint8Array[] {
    return this.failures.map((f) => f.id);
  }
}

export interface WrapErrorOptions {
  namespace?: string;
  /** Prefixes the message as "<operation> failed: ..." */
  operation?: string;
}

/**
 * Helper to wrap unknown errors as DiffError
 */
export function wrapError(
  error: unknown,
  defaultCode: DiffErrorCode = 'UNKNOWN',
  options: WrapErrorOptions = {}
): DiffError {
  if (error instanceof DiffError) {
    return error;
  }

  const { namespace, operation } = options;
  const detail = error instanceof Error ? error.message : String(error);

  return new DiffError({
    code: defaultCode,
    message: operation ? `${operation} failed: ${detail}` : detail,
    namespace,
    cause: error,
  });
}
