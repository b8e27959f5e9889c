/**
 * MCP Server Module Exports
 *
 * @module server
 */

// Error handling
export {
  SyncError,
  formatErrorResponse,
  validationError,
  collectionNotFoundError,
  filesNotFoundError,
  updateFailedError,
  pathNotFoundError,
  cacheError,
  internalError,
  type ErrorCategory,
  type ErrorResponse,
} from './errors.js';

// Type definitions
export {
  type ToolResult,
  type ToolResultSuccess,
  type ToolResultFailure,
  type ToolError,
  successResult,
} from './types.js';
