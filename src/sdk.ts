/**
 * Library entry point
 *
 * @module sdk
 */

export * from './models/location.js';
export * from './models/labels.js';
export * from './models/field-types.js';
export * from './models/schema.js';
export * from './models/wire.js';
export * from './services/platform/index.js';
export * from './services/labeling/index.js';
export * from './server/index.js';
export {
  createLogger,
  errorMessage,
  validateInput,
  ValidationError,
  parseDate,
  formatDisplayDate,
  formatUnambiguousDate,
  type Logger,
} from './utils/index.js';
