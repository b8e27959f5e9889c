/**
 * Unit tests for SyncError and the error factories
 *
 * @module tests/unit/server/errors
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  SyncError,
  formatErrorResponse,
  filesNotFoundError,
  updateFailedError,
  validationError,
} from '../../../src/server/errors.js';
import { APIError, InvalidRequestError, PollTimeoutError, QueryError } from '../../../src/services/platform/errors.js';
import { ValidationError } from '../../../src/utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// fromUnknown
// ═══════════════════════════════════════════════════════════════════════════════

describe('SyncError.fromUnknown', () => {
  it('should return SyncError instances unchanged', () => {
    const error = validationError('bad input');
    expect(SyncError.fromUnknown(error)).toBe(error);
  });

  it('should map transport errors to their categories', () => {
    const cases: Array<[Error, string]> = [
      [new APIError(500, 'boom', 'https://app.test'), 'API_ERROR'],
      [new QueryError('unknown field', '@files'), 'QUERY_ERROR'],
      [new InvalidRequestError('no'), 'INVALID_REQUEST'],
      [new PollTimeoutError('slow', ['f1']), 'POLL_TIMEOUT'],
      [new ValidationError('bad'), 'VALIDATION_ERROR'],
    ];
    for (const [error, category] of cases) {
      expect(SyncError.fromUnknown(error).category).toBe(category);
    }
  });

  it('should surface an exhausted rate limit as an API error', () => {
    const error = SyncError.fromUnknown(new APIError(429, 'slow down', 'https://app.test'));
    expect(error.category).toBe('API_ERROR');
    expect(error.message).toBe('429: slow down');
  });

  it('should map zod errors to VALIDATION_ERROR', () => {
    const result = z.string().safeParse(1);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(SyncError.fromUnknown(result.error).category).toBe('VALIDATION_ERROR');
    }
  });

  it('should fall back to the default category', () => {
    expect(SyncError.fromUnknown(new Error('oops')).category).toBe('INTERNAL_ERROR');
    expect(SyncError.fromUnknown(new Error('oops'), 'UPDATE_FAILED').category).toBe('UPDATE_FAILED');
  });

  it('should wrap non-Error values', () => {
    const error = SyncError.fromUnknown('plain string');
    expect(error.message).toBe('plain string');
    expect(error.details).toEqual({ originalValue: 'plain string' });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

describe('error factories', () => {
  it('should list at most ten missing files', () => {
    const missing = Array.from({ length: 12 }, (_, i) => `doc-${i}.pdf`);
    const error = filesNotFoundError(missing, 'collection');

    expect(error.category).toBe('FILE_NOT_FOUND');
    expect(error.message).toBe(
      '12 file(s) not found in the collection: doc-0.pdf, doc-1.pdf, doc-2.pdf, doc-3.pdf, doc-4.pdf, ' +
        'doc-5.pdf, doc-6.pdf, doc-7.pdf, doc-8.pdf, doc-9.pdf (and 2 more)'
    );
    expect(error.details).toEqual({ missing, scope: 'collection' });
  });

  it('should carry batch details on update failures', () => {
    const error = updateFailedError('Update failed', { batch: 2, offset: 100, attempts: 6, cause: '500: boom' });
    expect(formatErrorResponse(error)).toEqual({
      success: false,
      error: {
        category: 'UPDATE_FAILED',
        message: 'Update failed',
        details: { batch: 2, offset: 100, attempts: 6, cause: '500: boom' },
      },
    });
  });

  it('should serialize to JSON with its category', () => {
    const json = validationError('bad input', { field: 'Total' }).toJSON();
    expect(json).toMatchObject({
      name: 'SyncError',
      category: 'VALIDATION_ERROR',
      message: 'bad input',
      details: { field: 'Total' },
    });
  });
});
