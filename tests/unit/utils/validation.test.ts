/**
 * Unit Tests for tool input schemas
 */

import { describe, it, expect } from 'vitest';
import {
  BootstrapInput,
  QueryInput,
  SnapshotInput,
  UploadFilesInput,
  ValidationError,
  safeValidateInput,
  validateInput,
} from '../../../src/utils/validation.js';

describe('validateInput', () => {
  it('should apply defaults', () => {
    expect(validateInput(QueryInput, { query: '@files limit:0' })).toEqual({ query: '@files limit:0', mode: 'iql' });
  });

  it('should include the field path in the message', () => {
    expect(() => validateInput(QueryInput, { query: '' })).toThrow('query: Query is required');
  });
});

describe('safeValidateInput', () => {
  it('should return the error instead of throwing', () => {
    const result = safeValidateInput(SnapshotInput, { collection_ids: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ValidationError);
    }
  });
});

describe('BootstrapInput', () => {
  it('should default every sync option', () => {
    const input = validateInput(BootstrapInput, { data_dir: '/data/invoices' });
    expect(input).toEqual({
      data_dir: '/data/invoices',
      skip_upload: false,
      add_files: false,
      skip_missing_files: false,
      skip_type_inference: false,
      skip_new_fields: false,
      empty_labels: false,
      max_fields: -1,
      first_file: 0,
      max_files: -1,
      batch_size: 50,
      first_batch: 0,
      use_cache: true,
    });
  });

  it('should reject more than one collection selector', () => {
    expect(() =>
      validateInput(BootstrapInput, { data_dir: '/d', collection_id: 'c1', collection_prefix: 'p' })
    ).toThrow('collection_prefix, collection_id and collection_name are mutually exclusive');
  });
});

describe('UploadFilesInput', () => {
  it('should require at least one file', () => {
    expect(() => validateInput(UploadFilesInput, { files: [] })).toThrow('files: At least one file is required');
  });
});
