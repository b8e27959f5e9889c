/**
 * Platform Service
 * Exports the HTTP client, transport contract, query builders and configuration
 */

// Client
export { PlatformClient, urljoin, isLocalPath, buildFileObject } from './client.js';

// Configuration
export {
  type PlatformConfig,
  type PlatformConfigInput,
  PlatformConfigSchema,
  loadPlatformConfig,
  DEFAULT_BASE_URL,
  DEFAULT_COLLECTION_PREFIX,
} from './config.js';

// Context
export { createPlatformContext, type PlatformContext, type ContextOptions } from './context.js';

// Errors
export { APIError, QueryError, InvalidRequestError, PollTimeoutError } from './errors.js';

// Transport contract
export {
  collectUploadResult,
  SchemaNodeSchema,
  QueryResponseSchema,
  PollEventSchema,
  type PlatformTransport,
  type QueryMode,
  type QueryOptions,
  type QueryResponse,
  type PollEvent,
  type SchemaNode,
  type UploadFile,
  type UploadResult,
  type UpdateRecord,
  type ResourceType,
  type Mutation,
} from './transport.js';

// Query builders
export * as iql from './iql.js';
