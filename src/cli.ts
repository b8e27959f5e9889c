#!/usr/bin/env node
/**
 * docintel command line
 *
 *   docintel bootstrap <dir> [sync options]
 *   docintel snapshot --collection <id>... | --all-collections
 *   docintel snapshot-collections
 *   docintel query <query>
 *   docintel copy-fields <source name> <destination name>
 *
 * Diagnostics go to stderr; stdout carries only the command's result (for
 * snapshots, the directory written) so scripts can pipe it along.
 *
 * @module cli
 */

import dotenv from 'dotenv';
import { parseArgs } from 'util';

import { createPlatformContext, type PlatformContext } from './services/platform/context.js';
import { bootstrap } from './services/labeling/bootstrap.js';
import {
  captureWorkdir,
  collectionsWorkdir,
  listCollectionIds,
  parseFieldMapping,
  snapshotCollections,
  snapshotManyCollections,
  writeSnapshot,
} from './services/labeling/snapshot.js';
import { copyFields } from './services/labeling/fields.js';
import {
  validateInput,
  BootstrapInput,
  QueryInput,
  SnapshotInput,
  SnapshotCollectionsInput,
  CopyFieldsInput,
} from './utils/validation.js';
import { SyncError, validationError } from './server/errors.js';

const USAGE = `Usage: docintel <command> [options]

Commands:
  bootstrap <dir>                  Sync the manifest in <dir> into a collection
  snapshot                         Write a collection's fields and labels to a manifest
  snapshot-collections             Write every file's collection membership to a manifest
  query <query>                    Run a query and print the rows as JSON
  copy-fields <source> <dest>      Create <dest> with the fields of <source>

Global options:
  --org-name <name>  --api-token <token>  --base-url <url>
  --data <dir>       --parallelism <n>    --verbose`;

const GLOBAL_OPTIONS = {
  'org-name': { type: 'string' },
  'api-token': { type: 'string' },
  'base-url': { type: 'string' },
  data: { type: 'string' },
  parallelism: { type: 'string' },
  verbose: { type: 'boolean', short: 'v' },
  help: { type: 'boolean', short: 'h' },
} as const;

interface GlobalValues {
  'org-name'?: string;
  'api-token'?: string;
  'base-url'?: string;
  data?: string;
  parallelism?: string;
  verbose?: boolean;
}

function intFlag(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  if (Number.isNaN(n)) {
    throw validationError(`--${name} expects an integer, got "${value}"`);
  }
  return n;
}

function contextFrom(values: GlobalValues): PlatformContext {
  return createPlatformContext({
    tag: 'docintel',
    verbose: values.verbose ?? false,
    overrides: {
      orgName: values['org-name'],
      apiToken: values['api-token'],
      baseUrl: values['base-url'],
      dataDir: values.data,
      parallelism: intFlag('parallelism', values.parallelism),
    },
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

async function runBootstrap(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      ...GLOBAL_OPTIONS,
      'collection-prefix': { type: 'string' },
      collection: { type: 'string' },
      name: { type: 'string' },
      'skip-upload': { type: 'boolean' },
      'add-files': { type: 'boolean' },
      'skip-missing-files': { type: 'boolean' },
      'skip-type-inference': { type: 'boolean' },
      'skip-new-fields': { type: 'boolean' },
      'label-empty-values': { type: 'boolean' },
      'max-fields': { type: 'string' },
      'first-file': { type: 'string' },
      'max-files': { type: 'string' },
      'batch-size': { type: 'string' },
      'first-batch': { type: 'string' },
      'no-cache': { type: 'boolean' },
      'cache-dir': { type: 'string' },
    },
  });

  const input = validateInput(BootstrapInput, {
    data_dir: positionals[0],
    collection_prefix: values['collection-prefix'],
    collection_id: values.collection,
    collection_name: values.name,
    skip_upload: values['skip-upload'],
    add_files: values['add-files'],
    skip_missing_files: values['skip-missing-files'],
    skip_type_inference: values['skip-type-inference'],
    skip_new_fields: values['skip-new-fields'],
    empty_labels: values['label-empty-values'],
    max_fields: intFlag('max-fields', values['max-fields']),
    first_file: intFlag('first-file', values['first-file']),
    max_files: intFlag('max-files', values['max-files']),
    batch_size: intFlag('batch-size', values['batch-size']),
    first_batch: intFlag('first-batch', values['first-batch']),
    use_cache: values['no-cache'] ? false : undefined,
    cache_dir: values['cache-dir'],
  });

  const ctx = contextFrom(values);
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
  process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
}

async function runSnapshot(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      ...GLOBAL_OPTIONS,
      collection: { type: 'string', multiple: true },
      'all-collections': { type: 'boolean' },
      'collection-name-filter': { type: 'string' },
      'exclude-collection': { type: 'string', multiple: true },
      'download-files': { type: 'boolean', short: 's' },
      'original-names': { type: 'boolean' },
      'labeled-files-only': { type: 'boolean' },
      'filter-collection': { type: 'string' },
      'label-filter': { type: 'string' },
      'allow-low-confidence': { type: 'boolean' },
      'field-mapping': { type: 'string' },
    },
  });

  const explicit = values.collection ?? [];
  if ((explicit.length === 0) === !values['all-collections']) {
    throw validationError('Must specify exactly one of --collection or --all-collections');
  }

  const ctx = contextFrom(values);
  const collectionIds = values['all-collections']
    ? await listCollectionIds(ctx.client, {
        nameFilter: values['collection-name-filter'],
        exclude: values['exclude-collection'],
      })
    : explicit;

  const input = validateInput(SnapshotInput, {
    collection_ids: collectionIds,
    data_dir: values.data,
    original_names: values['original-names'],
    labeled_files_only: values['labeled-files-only'],
    filter_collection: values['filter-collection'],
    label_filter: values['label-filter'],
    allow_low_confidence: values['allow-low-confidence'],
    field_mapping: values['field-mapping'],
    download_files: values['download-files'],
  });

  const result = await snapshotManyCollections(ctx.client, input.collection_ids, {
    useOriginalFilenames: input.original_names,
    labeledFilesOnly: input.labeled_files_only,
    filterCollectionId: input.filter_collection,
    labelFilter: input.label_filter,
    allowLowConfidence: input.allow_low_confidence,
    fieldMapping: input.field_mapping ? parseFieldMapping(input.field_mapping) : undefined,
    log: ctx.log,
  });

  const workdir = captureWorkdir(ctx.config.dataDir, input.collection_ids[0]);
  await writeSnapshot(workdir, result, {
    downloadFiles: input.download_files,
    parallelism: ctx.config.parallelism,
    log: ctx.log,
  });

  ctx.log.info('Documents and labels have been written to directory:');
  process.stdout.write(`${workdir}\n`);
}

async function runSnapshotCollections(args: string[]): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      ...GLOBAL_OPTIONS,
      'download-files': { type: 'boolean', short: 's' },
      'original-names': { type: 'boolean' },
    },
  });

  const input = validateInput(SnapshotCollectionsInput, {
    data_dir: values.data,
    original_names: values['original-names'],
  });
  const ctx = contextFrom(values);

  const result = await snapshotCollections(ctx.client, { useOriginalFilenames: input.original_names });
  const workdir = collectionsWorkdir(ctx.config.dataDir);
  await writeSnapshot(workdir, result, {
    downloadFiles: values['download-files'],
    parallelism: ctx.config.parallelism,
    log: ctx.log,
  });

  ctx.log.info(`Documents and collection labels have been written to directory '${workdir}'`);
  process.stdout.write(`${workdir}\n`);
}

async function runQuery(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      ...GLOBAL_OPTIONS,
      poll: { type: 'boolean' },
      cursor: { type: 'string' },
      timeout: { type: 'string' },
    },
  });

  const input = validateInput(QueryInput, {
    query: positionals.join(' '),
    mode: values.poll ? 'poll' : 'iql',
    cursor: values.cursor,
    timeout: intFlag('timeout', values.timeout),
  });
  const ctx = contextFrom(values);

  const response = await ctx.client.query(input.query, {
    mode: input.mode,
    cursor: input.cursor,
    timeout: input.timeout,
  });
  process.stdout.write(`${JSON.stringify({ data: response.data, cursor: response.cursor ?? null }, null, 2)}\n`);
}

async function runCopyFields(args: string[]): Promise<void> {
  const { values, positionals } = parseArgs({ args, allowPositionals: true, options: GLOBAL_OPTIONS });

  const input = validateInput(CopyFieldsInput, {
    source_collection_name: positionals[0],
    destination_collection_name: positionals[1],
  });
  const ctx = contextFrom(values);

  const result = await copyFields(ctx.client, input.source_collection_name, input.destination_collection_name, ctx.log);
  process.stdout.write(`${result.collectionUrl}\n`);
}

const COMMANDS: Record<string, (args: string[]) => Promise<void>> = {
  bootstrap: runBootstrap,
  snapshot: runSnapshot,
  'snapshot-collections': runSnapshotCollections,
  query: runQuery,
  'copy-fields': runCopyFields,
};

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY
// ═══════════════════════════════════════════════════════════════════════════════

async function main(argv: string[]): Promise<void> {
  const [command, ...rest] = argv;
  if (command === undefined || command === '--help' || command === '-h') {
    console.error(USAGE);
    return;
  }

  const run = COMMANDS[command];
  if (!run) {
    console.error(USAGE);
    throw validationError(`Unknown command: ${command}`);
  }
  if (rest.includes('--help') || rest.includes('-h')) {
    console.error(USAGE);
    return;
  }
  await run(rest);
}

dotenv.config();

main(process.argv.slice(2)).catch((error) => {
  const syncError = SyncError.fromUnknown(error);
  console.error(`[docintel] ERROR: ${syncError.category}: ${syncError.message}`);
  process.exitCode = 1;
});
