/**
 * Utility Functions Barrel Export
 *
 * @module utils
 */

// File system helpers
export {
  getFileExtension,
  getMimeType,
  ensureDirectory,
  fileExists,
  readJsonFile,
  writeJsonFile,
  readFileBuffer,
} from './files.js';

// Concurrency
export { chunk, mapWithConcurrency, sleep } from './concurrency.js';

// Dates
export {
  formatDisplayDate,
  formatUnambiguousDate,
  parseDate,
  DISPLAY_DATE_FORMAT,
  UNAMBIGUOUS_DATE_FORMAT,
} from './dates.js';

// Logging
export { createLogger, errorMessage, type Logger } from './logger.js';

// Validation utilities for MCP tool inputs
export {
  // Helper functions
  validateInput,
  safeValidateInput,
  ValidationError,

  // Shared enums
  QueryMode,

  // Tool schemas
  QueryInput,
  CollectionFieldsInput,
  UploadFilesInput,
  PollResultsInput,
  BootstrapInput,
  SnapshotInput,
  SnapshotCollectionsInput,
  CopyFieldsInput,
} from './validation.js';
