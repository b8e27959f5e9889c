/**
 * Labeling Service
 * Sync engine (manifest to collection), snapshots (collection to manifest)
 * and field copying
 */

// Sync run
export {
  SyncOrchestrator,
  selectEntries,
  entryName,
  UPLOAD_BATCH_SIZE,
  POLL_TIMEOUT_SECONDS,
  POLL_MAX_ATTEMPTS,
  type SyncOptions,
  type SyncReport,
  type SyncStage,
} from './orchestrator.js';
export { bootstrap, type BootstrapContext, type BootstrapOptions } from './bootstrap.js';

// Evidence and labels
export { EntityIndex } from './entity-index.js';
export {
  generateLabels,
  findOverlappingWords,
  resolveSupportingWords,
  entityFieldType,
  FIRST_CLASS_ENTITY_TYPES,
  type GenerateLabelsInput,
  type LabelSet,
} from './label-builder.js';

// Schema reconciliation
export {
  generateSchema,
  fetchCurrentFields,
  fieldsToDocSchema,
  filterInferredFields,
  parseFieldComment,
  narrowFieldType,
  reconcileSchema,
  createFieldsInBatches,
  FIELD_CREATION_BATCH_SIZE,
  type SchemaField,
  type SchemaConflict,
  type ReconcileInput,
  type ReconcilePlan,
} from './schema-reconciler.js';

// Batched updates
export {
  applyUpdatesInBatches,
  miniBatchSize,
  DEFAULT_UPDATE_BATCH_SIZE,
  DEFAULT_MAX_UPDATE_ATTEMPTS,
  type BatchUpdateOptions,
  type BatchUpdateResult,
} from './batch-update.js';

// Cache
export { DocumentCache, type CacheEntry } from './document-cache.js';

// Snapshots
export {
  rowToRecord,
  rowToFileName,
  snapshotCollection,
  snapshotManyCollections,
  snapshotCollections,
  listCollectionIds,
  parseFieldMapping,
  mapDocSchema,
  writeSnapshot,
  captureWorkdir,
  collectionsWorkdir,
  type SnapshotOptions,
  type SnapshotRecord,
  type SnapshotResult,
} from './snapshot.js';

// Fields
export { copyFields, ownFields, type CopyFieldsResult } from './fields.js';
