/**
 * Error Handling
 *
 * FAIL FAST: fatal conditions throw immediately with descriptive context.
 * Non-fatal conditions (schema conflicts, single-record label failures) are
 * logged by the caller and never reach this module.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for tool and CLI failures
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Transport errors
  | 'API_ERROR'
  | 'QUERY_ERROR'
  | 'INVALID_REQUEST'
  | 'POLL_TIMEOUT'

  // Collection / file errors
  | 'COLLECTION_NOT_FOUND'
  | 'FILE_NOT_FOUND'

  // Sync errors
  | 'UPDATE_FAILED'

  // File system errors
  | 'PATH_NOT_FOUND'
  | 'CACHE_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map error class names to SyncError categories so callers can tell a
 * rejected query from a stalled poll without parsing messages.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',

  APIError: 'API_ERROR',
  QueryError: 'QUERY_ERROR',
  InvalidRequestError: 'INVALID_REQUEST',
  PollTimeoutError: 'POLL_TIMEOUT',
};

// ═══════════════════════════════════════════════════════════════════════════════
// SYNC ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * SyncError - Structured error class for all tool and CLI failures
 */
export class SyncError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SyncError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SyncError);
    }
  }

  /**
   * Create error from unknown caught value. Always produces a typed error.
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): SyncError {
    if (error instanceof SyncError) {
      return error;
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      return new SyncError(category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new SyncError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

export interface ErrorResponse {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Format SyncError for tool response
 */
export function formatErrorResponse(error: SyncError): ErrorResponse {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function validationError(message: string, details?: Record<string, unknown>): SyncError {
  return new SyncError('VALIDATION_ERROR', message, details);
}

export function collectionNotFoundError(nameOrId: string): SyncError {
  return new SyncError('COLLECTION_NOT_FOUND', `Collection "${nameOrId}" not found`, {
    collection: nameOrId,
  });
}

/**
 * Files named in a manifest that the collection (or the whole org) does not hold
 */
export function filesNotFoundError(missing: string[], scope: 'collection' | 'org'): SyncError {
  const shown = missing.slice(0, 10).join(', ');
  const more = missing.length > 10 ? ` (and ${missing.length - 10} more)` : '';
  return new SyncError(
    'FILE_NOT_FOUND',
    `${missing.length} file(s) not found in the ${scope}: ${shown}${more}`,
    { missing, scope }
  );
}

export function updateFailedError(
  message: string,
  details: { batch: number; offset: number; attempts: number; cause: string }
): SyncError {
  return new SyncError('UPDATE_FAILED', message, details);
}

export function pathNotFoundError(path: string): SyncError {
  return new SyncError('PATH_NOT_FOUND', `Path does not exist: ${path}`, {
    path,
  });
}

export function cacheError(path: string, cause: string): SyncError {
  return new SyncError('CACHE_ERROR', `Cache entry ${path} is unreadable: ${cause}`, {
    path,
  });
}

export function internalError(message: string, details?: Record<string, unknown>): SyncError {
  return new SyncError('INTERNAL_ERROR', message, details);
}
