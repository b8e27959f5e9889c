/**
 * Sync MCP Tools
 *
 * Tools: docintel_bootstrap, docintel_snapshot, docintel_snapshot_collections
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/sync
 */

import { formatResponse, handleError, type ContextProvider, type ToolDefinition, type ToolResponse } from './shared.js';
import { successResult } from '../server/types.js';
import {
  validateInput,
  BootstrapInput,
  SnapshotInput,
  SnapshotCollectionsInput,
} from '../utils/validation.js';
import { bootstrap } from '../services/labeling/bootstrap.js';
import {
  captureWorkdir,
  collectionsWorkdir,
  parseFieldMapping,
  snapshotCollections,
  snapshotManyCollections,
  writeSnapshot,
} from '../services/labeling/snapshot.js';

export function createSyncTools(getContext: ContextProvider): Record<string, ToolDefinition> {
  // ═════════════════════════════════════════════════════════════════════════════
  // docintel_bootstrap
  // ═════════════════════════════════════════════════════════════════════════════

  async function handleBootstrap(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(BootstrapInput, params);
      const ctx = getContext();

      const report = await bootstrap(ctx, input.data_dir, {
        collectionPrefix: input.collection_prefix,
        collectionId: input.collection_id,
        collectionName: input.collection_name,
        skipUpload: input.skip_upload,
        addFiles: input.add_files,
        skipMissingFiles: input.skip_missing_files,
        skipTypeInference: input.skip_type_inference,
        skipNewFields: input.skip_new_fields,
        emptyLabels: input.empty_labels,
        maxFields: input.max_fields,
        firstFile: input.first_file,
        maxFiles: input.max_files,
        batchSize: input.batch_size,
        firstBatch: input.first_batch,
        useCache: input.use_cache,
        cacheDir: input.cache_dir,
      });

      return formatResponse(successResult(report));
    } catch (error) {
      return handleError(error);
    }
  }

  // ═════════════════════════════════════════════════════════════════════════════
  // docintel_snapshot
  // ═════════════════════════════════════════════════════════════════════════════

  async function handleSnapshot(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(SnapshotInput, params);
      const { client, config, log } = getContext();

      const result = await snapshotManyCollections(client, input.collection_ids, {
        useOriginalFilenames: input.original_names,
        labeledFilesOnly: input.labeled_files_only,
        filterCollectionId: input.filter_collection,
        labelFilter: input.label_filter,
        allowLowConfidence: input.allow_low_confidence,
        fieldMapping: input.field_mapping ? parseFieldMapping(input.field_mapping) : undefined,
        log,
      });

      const workdir = captureWorkdir(input.data_dir ?? config.dataDir, input.collection_ids[0]);
      const manifestPath = await writeSnapshot(workdir, result, {
        downloadFiles: input.download_files,
        parallelism: config.parallelism,
        log,
      });

      return formatResponse(
        successResult({
          workdir,
          manifest_path: manifestPath,
          documents: result.records.length,
          labeled_documents: result.records.filter((r) => r.record !== null).length,
          fields: Object.keys(result.docSchema.fields),
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  // ═════════════════════════════════════════════════════════════════════════════
  // docintel_snapshot_collections
  // ═════════════════════════════════════════════════════════════════════════════

  async function handleSnapshotCollections(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(SnapshotCollectionsInput, params);
      const { client, config, log } = getContext();

      const result = await snapshotCollections(client, { useOriginalFilenames: input.original_names });
      const workdir = collectionsWorkdir(input.data_dir ?? config.dataDir);
      const manifestPath = await writeSnapshot(workdir, result, { parallelism: config.parallelism, log });

      return formatResponse(
        successResult({
          workdir,
          manifest_path: manifestPath,
          documents: result.records.length,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    docintel_bootstrap: {
      description:
        'Sync a local manifest directory into a collection: upload files, create fields and write labels',
      inputSchema: BootstrapInput.innerType().shape,
      handler: handleBootstrap,
    },
    docintel_snapshot: {
      description: "Snapshot collections' fields and confirmed labels into a local manifest directory",
      inputSchema: SnapshotInput.shape,
      handler: handleSnapshot,
    },
    docintel_snapshot_collections: {
      description: 'Snapshot which collection every file in the org belongs to, as document tags',
      inputSchema: SnapshotCollectionsInput.shape,
      handler: handleSnapshotCollections,
    },
  };
}
