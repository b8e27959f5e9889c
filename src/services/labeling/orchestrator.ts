/**
 * Sync orchestrator
 *
 * Drives one sync run from a manifest to labeled files on the platform:
 *
 *   Init -> EnsureCollection -> ResolveFiles -> FilterLabeled -> BuildLabels
 *        -> ReconcileSchema -> BatchedUpdate -> Done
 *
 * Only upload and text retrieval run concurrently (bounded by
 * `parallelism`); every other stage runs in order on the caller.
 *
 * @module services/labeling/orchestrator
 */

import * as os from 'os';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import type { DocData, DocRecord, DocSchema } from '../../models/schema.js';
import { isDocumentTagOnly } from '../../models/schema.js';
import { RetrievedDocumentSchema, type RetrievedDocument } from '../../models/wire.js';
import {
  collectUploadResult,
  PollEventSchema,
  type PlatformTransport,
  type UpdateRecord,
  type UploadFile,
} from '../platform/transport.js';
import { isLocalPath } from '../platform/client.js';
import { DEFAULT_COLLECTION_PREFIX } from '../platform/config.js';
import { PollTimeoutError } from '../platform/errors.js';
import * as iql from '../platform/iql.js';
import { EntityIndex } from './entity-index.js';
import { generateLabels, type LabelSet } from './label-builder.js';
import {
  createFieldsInBatches,
  fetchCurrentFields,
  generateSchema,
  reconcileSchema,
  type SchemaConflict,
  type SchemaField,
} from './schema-reconciler.js';
import { applyUpdatesInBatches, type BatchUpdateResult } from './batch-update.js';
import { DocumentCache } from './document-cache.js';
import { chunk, mapWithConcurrency } from '../../utils/concurrency.js';
import { validateInput } from '../../utils/validation.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import { filesNotFoundError, internalError, validationError } from '../../server/errors.js';

export const UPLOAD_BATCH_SIZE = 20;
export const POLL_TIMEOUT_SECONDS = 60;
export const POLL_MAX_ATTEMPTS = 10;
const NAME_QUERY_BATCH_SIZE = 100;

export type SyncStage =
  | 'init'
  | 'ensure-collection'
  | 'resolve-files'
  | 'filter-labeled'
  | 'build-labels'
  | 'reconcile-schema'
  | 'batched-update'
  | 'done';

export interface SyncOptions {
  /** Mutually exclusive with collectionId and collectionName */
  collectionPrefix?: string;
  collectionId?: string;
  collectionName?: string;
  parallelism?: number;
  skipUpload?: boolean;
  /** Add files that exist elsewhere in the org (requires skipUpload) */
  addFiles?: boolean;
  skipMissingFiles?: boolean;
  skipTypeInference?: boolean;
  skipNewFields?: boolean;
  emptyLabels?: boolean;
  maxFields?: number;
  firstFile?: number;
  maxFiles?: number;
  batchSize?: number;
  firstBatch?: number;
  /** Directory for the retrieved-document cache; null disables it */
  cacheDir?: string | null;
  maxUpdateAttempts?: number;
  updateBackoffMs?: number;
  uploadBatchSize?: number;
  pollTimeoutSeconds?: number;
  pollMaxAttempts?: number;
}

export interface SyncReport {
  collectionId: string;
  collectionUrl: string;
  createdCollection: boolean;
  filesResolved: number;
  filesLabeled: number;
  /** Files whose labels could not be built; they were sent with no labels */
  failedLabelBuilds: string[];
  createdFields: SchemaField[];
  updatedFields: string[];
  conflicts: SchemaConflict[];
  update: BatchUpdateResult | null;
  modelVersionTarget: number | null;
  stages: SyncStage[];
}

interface ResolvedEntry {
  entry: DocData;
  document: RetrievedDocument;
}

interface LabeledEntry {
  name: string;
  record: DocRecord;
  document: RetrievedDocument;
}

const ModelVersionRowSchema = z.object({
  field_name: z.string(),
  model_version: z.number(),
});

const OrgFileRowSchema = z.object({
  name: z.string(),
  uid: z.string(),
});

const IncrementRowSchema = z.object({ increment: z.number().nullish() });
const ModelVersionSumRowSchema = z.object({ sum_mv: z.number().nullish() });

export function entryName(entry: DocData): string {
  return path.basename(entry.fname);
}

/**
 * Apply firstFile and maxFiles. When capping, labeled entries go first.
 */
export function selectEntries(entries: readonly DocData[], firstFile: number, maxFiles: number): DocData[] {
  const selected = entries.slice(firstFile);
  if (maxFiles === -1) {
    return selected;
  }
  const ordered = [...selected].sort((a, b) => Number(a.record === null) - Number(b.record === null));
  return ordered.slice(0, maxFiles);
}

export class SyncOrchestrator {
  private stages: SyncStage[] = [];

  constructor(
    private readonly transport: PlatformTransport,
    private readonly log: Logger
  ) {}

  async run(docSchema: DocSchema, allEntries: readonly DocData[], options: SyncOptions = {}): Promise<SyncReport> {
    this.stages = [];
    this.enter('init');
    this.validateOptions(options);

    const schema = generateSchema(docSchema);
    const skipText = isDocumentTagOnly(docSchema);

    this.enter('ensure-collection');
    const { collectionId, created } = await this.ensureCollection(options);
    const collectionUrl = this.transport.getAppUrl('fc', collectionId);
    this.log.info(`You can visit the collection at: ${collectionUrl}`);

    const report: SyncReport = {
      collectionId,
      collectionUrl,
      createdCollection: created,
      filesResolved: 0,
      filesLabeled: 0,
      failedLabelBuilds: [],
      createdFields: [],
      updatedFields: [],
      conflicts: [],
      update: null,
      modelVersionTarget: null,
      stages: this.stages,
    };

    this.enter('resolve-files');
    const entries = selectEntries(allEntries, options.firstFile ?? 0, options.maxFiles ?? -1);
    const resolved = options.skipUpload
      ? await this.resolveExisting(collectionId, entries, skipText, options)
      : await this.uploadAndRetrieve(collectionId, entries, skipText, options);
    report.filesResolved = resolved.length;
    this.log.debug(`File uids: ${resolved.map((r) => r.document.uid).join(', ')}`);

    this.enter('filter-labeled');
    const labeled = this.filterLabeled(resolved);
    if (labeled.length === 0) {
      this.log.warn('No records have labels. Stopping now that uploads have completed.');
      this.enter('done');
      return report;
    }
    report.filesLabeled = labeled.length;

    this.enter('build-labels');
    const modelVersions = await this.fetchModelVersions(collectionId);
    const labels = labeled.map((l) => {
      try {
        return generateLabels({
          fileName: l.document.name,
          record: l.record,
          schema: docSchema,
          words: l.document.text.words,
          entityIndex: EntityIndex.build(l.document.entities),
          modelVersions,
          emptyLabels: options.emptyLabels ?? false,
          log: this.log,
        });
      } catch (error) {
        this.log.error(`Failed to build labels for ${l.name}: ${errorMessage(error)}`);
        report.failedLabelBuilds.push(l.name);
        const empty: LabelSet = {};
        return empty;
      }
    });

    this.enter('reconcile-schema');
    const currentFields = await fetchCurrentFields(this.transport, collectionId);
    const plan = reconcileSchema({
      schema,
      labels,
      currentFields,
      skipTypeInference: options.skipTypeInference,
      skipNewFields: options.skipNewFields,
      maxFields: options.maxFields,
      log: this.log,
    });
    report.createdFields = plan.fieldsToCreate;
    report.updatedFields = plan.fieldNamesToUpdate;
    report.conflicts = plan.conflicts;

    if (plan.fieldSpecs.length > 0) {
      this.log.info(`Creating fields: ${plan.fieldsToCreate.map((f) => f.name).join(', ')}`);
      await createFieldsInBatches(this.transport, collectionId, plan.fieldSpecs);
    }

    const updateNames = plan.fieldsToUpdate.map((f) => f.name);
    report.modelVersionTarget = await this.snapshotModelVersionTarget(collectionId, updateNames, modelVersions);

    this.enter('batched-update');
    const updateSet = new Set(updateNames);
    const records: UpdateRecord[] = labeled.map((l, i) => {
      const record: UpdateRecord = { uid: l.document.uid };
      for (const [fieldName, label] of Object.entries(labels[i])) {
        if (updateSet.has(fieldName)) record[fieldName] = label;
      }
      return record;
    });

    this.log.info(`Running update on ${records.length} files`);
    report.update = await applyUpdatesInBatches(this.transport, collectionId, records, {
      batchSize: options.batchSize,
      firstBatch: options.firstBatch,
      maxAttempts: options.maxUpdateAttempts,
      backoffMs: options.updateBackoffMs,
      log: this.log,
    });
    this.log.info(`Done running update on ${records.length} files. Models will now update!`);

    this.enter('done');
    return report;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // STAGES
  // ═══════════════════════════════════════════════════════════════════════════

  private enter(stage: SyncStage): void {
    this.stages.push(stage);
    this.log.debug(`Stage: ${stage}`);
  }

  private validateOptions(options: SyncOptions): void {
    const selectors = [options.collectionPrefix, options.collectionId, options.collectionName].filter(
      (v) => v !== undefined
    );
    if (selectors.length > 1) {
      throw validationError('collectionPrefix, collectionId and collectionName are mutually exclusive');
    }
    if (options.addFiles && !options.skipUpload) {
      throw validationError('Cannot add existing files to the collection unless you skip upload');
    }
    if (options.collectionId === undefined && options.skipUpload && !options.addFiles) {
      throw validationError("Cannot skip uploading if we're creating a new collection");
    }
  }

  private async ensureCollection(options: SyncOptions): Promise<{ collectionId: string; created: boolean }> {
    if (options.collectionId !== undefined) {
      return { collectionId: options.collectionId, created: false };
    }

    const name = options.collectionName ?? `${options.collectionPrefix ?? DEFAULT_COLLECTION_PREFIX}-${uuidv4()}`;
    this.log.info(`Creating collection ${name}`);
    const collectionId = await this.transport.createCollection(name);
    return { collectionId, created: true };
  }

  /**
   * Drop entries without a record, and later entries that resolved to a file
   * already seen
   */
  private filterLabeled(resolved: readonly ResolvedEntry[]): LabeledEntry[] {
    const seen = new Set<string>();
    const labeled: LabeledEntry[] = [];
    for (const { entry, document } of resolved) {
      if (entry.record === null) continue;
      if (seen.has(document.uid)) {
        this.log.warn(`Skipping ${entry.fname}: file ${document.uid} is already labeled by an earlier entry`);
        continue;
      }
      seen.add(document.uid);
      labeled.push({ name: entryName(entry), record: entry.record, document });
    }
    return labeled;
  }

  private async fetchModelVersions(collectionId: string): Promise<Record<string, number>> {
    const response = await this.transport.query(iql.modelVersions(collectionId));
    const versions: Record<string, number> = {};
    for (const raw of response.data) {
      const row = validateInput(ModelVersionRowSchema, raw);
      versions[row.field_name] = row.model_version;
    }
    return versions;
  }

  /**
   * Record the model-version total the collection should reach once the
   * platform has retrained on the labels about to be written
   */
  private async snapshotModelVersionTarget(
    collectionId: string,
    fieldNames: readonly string[],
    modelVersions: Readonly<Record<string, number>>
  ): Promise<number | null> {
    const incrementQuery = iql.expectedIncrement(collectionId, fieldNames, modelVersions);
    const sumQuery = iql.modelVersionSum(collectionId, fieldNames);
    try {
      this.log.info(`Running expected increment query ${incrementQuery}`);
      const incrementRows = (await this.transport.query(incrementQuery)).data;
      const increment = incrementRows.length > 0 ? validateInput(IncrementRowSchema, incrementRows[0]).increment ?? 0 : 0;

      this.log.info(`Running model version query ${sumQuery}`);
      const sumRows = (await this.transport.query(sumQuery)).data;
      const sum = sumRows.length > 0 ? validateInput(ModelVersionSumRowSchema, sumRows[0]).sum_mv ?? 0 : 0;

      const target = sum + increment;
      this.log.info(
        `Current model version total ${sum}. Target is ${target} across ${fieldNames.length} fields`
      );
      return target;
    } catch (error) {
      this.log.warn(`Could not snapshot model versions: ${errorMessage(error)}`);
      return null;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // UPLOAD PATH
  // ═══════════════════════════════════════════════════════════════════════════

  private async uploadAndRetrieve(
    collectionId: string,
    entries: readonly DocData[],
    skipText: boolean,
    options: SyncOptions
  ): Promise<ResolvedEntry[]> {
    const batches = chunk(entries, options.uploadBatchSize ?? UPLOAD_BATCH_SIZE);
    const parallelism = options.parallelism ?? os.availableParallelism();

    this.log.info(`Uploading ${entries.length} files`);
    const results = await mapWithConcurrency(batches, parallelism, (batch) =>
      this.uploadBatch(collectionId, batch, skipText, options)
    );
    return results.flat();
  }

  private async uploadBatch(
    collectionId: string,
    batch: readonly DocData[],
    skipText: boolean,
    options: SyncOptions
  ): Promise<ResolvedEntry[]> {
    const names = [...new Set(batch.map(entryName))];
    const existing = await this.queryDocumentsByName(
      iql.preprocessedDocumentsByName(collectionId, names, skipText)
    );

    const toUpload = new Map<string, UploadFile>();
    for (const entry of batch) {
      const name = entryName(entry);
      if (!existing.has(name) && !toUpload.has(name)) {
        toUpload.set(name, { name, path: entry.url ?? entry.fname });
      }
    }

    const uidsByName = new Map<string, string>();
    if (toUpload.size > 0) {
      const files = [...toUpload.values()];
      const local = files.filter((f) => isLocalPath(f.path));
      const remote = files.filter((f) => !isLocalPath(f.path));
      for (const group of [local, remote]) {
        if (group.length === 0) continue;
        const uids = await collectUploadResult(await this.transport.uploadFiles(collectionId, group));
        if (uids.length !== group.length) {
          throw internalError(`Uploaded ${group.length} files but received ${uids.length} uids`, {
            files: group.map((f) => f.name),
            uids,
          });
        }
        group.forEach((f, i) => uidsByName.set(f.name, uids[i]));
      }
    }

    const processed = await this.waitForProcessing(collectionId, [...uidsByName.values()], skipText, options);

    return batch.map((entry) => {
      const name = entryName(entry);
      const uid = uidsByName.get(name);
      const document = existing.get(name) ?? (uid !== undefined ? processed.get(uid) : undefined);
      if (!document) {
        throw internalError(`No document was retrieved for ${name}`);
      }
      return { entry, document };
    });
  }

  /**
   * Long-poll until every uid is preprocessed
   *
   * @throws PollTimeoutError when the attempt ceiling passes first
   */
  private async waitForProcessing(
    collectionId: string,
    uids: readonly string[],
    skipText: boolean,
    options: SyncOptions
  ): Promise<Map<string, RetrievedDocument>> {
    const done = new Map<string, RetrievedDocument>();
    const pending = new Set(uids);
    const timeout = options.pollTimeoutSeconds ?? POLL_TIMEOUT_SECONDS;
    const maxAttempts = options.pollMaxAttempts ?? POLL_MAX_ATTEMPTS;
    const query = iql.preprocessedDocumentsByUid(collectionId, uids, skipText);
    let cursor: string | undefined;

    for (let attempt = 0; pending.size > 0; attempt++) {
      if (attempt >= maxAttempts) {
        throw new PollTimeoutError(`Poll timed out waiting for ${pending.size} file(s) to process`, [...pending]);
      }
      const response = await this.transport.query(query, { mode: 'poll', cursor, timeout });
      for (const raw of response.data) {
        const event = validateInput(PollEventSchema, raw);
        if (event.action !== 'insert') continue;
        const document = validateInput(RetrievedDocumentSchema, event.data);
        if (pending.delete(document.uid)) {
          done.set(document.uid, document);
        }
      }
      cursor = response.cursor ?? undefined;
    }
    return done;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // SKIP-UPLOAD PATH
  // ═══════════════════════════════════════════════════════════════════════════

  private async resolveExisting(
    collectionId: string,
    entries: readonly DocData[],
    skipText: boolean,
    options: SyncOptions
  ): Promise<ResolvedEntry[]> {
    const cache = options.cacheDir ? new DocumentCache(options.cacheDir) : null;
    const names = [...new Set(entries.map(entryName))];
    const resolved = new Map<string, RetrievedDocument>();
    const toQuery: string[] = [];

    for (const name of names) {
      const cached = cache ? await cache.read(name) : null;
      if (cached?.status === 'found') {
        resolved.set(name, cached.document);
      } else if (cached?.status === 'missing' && options.skipMissingFiles) {
        continue;
      } else {
        toQuery.push(name);
      }
    }
    if (cache) {
      this.log.info(`Found ${resolved.size}/${names.length} files in the cache`);
    }

    if (toQuery.length > 0) {
      const fetched = await this.queryCollectionByName(collectionId, toQuery, skipText);

      if (options.addFiles) {
        const missing = toQuery.filter((n) => !fetched.has(n));
        if (missing.length > 0) {
          await this.addOrgFiles(collectionId, missing);
          const added = await this.queryCollectionByName(collectionId, missing, skipText);
          for (const [name, doc] of added) fetched.set(name, doc);
        }
      }

      for (const name of toQuery) {
        const document = fetched.get(name);
        if (document) {
          resolved.set(name, document);
          await cache?.writeFound(name, document);
        } else {
          await cache?.writeMissing(name);
        }
      }
    }

    const missing = names.filter((n) => !resolved.has(n));
    if (missing.length > 0) {
      if (!options.skipMissingFiles) {
        throw filesNotFoundError(missing, 'collection');
      }
      this.log.warn(`Skipping ${missing.length} files missing from the collection`);
    }

    const out: ResolvedEntry[] = [];
    for (const entry of entries) {
      const document = resolved.get(entryName(entry));
      if (document) out.push({ entry, document });
    }
    return out;
  }

  /**
   * Find files by name anywhere in the org and add them to the collection.
   * Every name must be found.
   */
  private async addOrgFiles(collectionId: string, names: readonly string[]): Promise<void> {
    const uidsByName = new Map<string, string>();
    for (const batch of chunk(names, NAME_QUERY_BATCH_SIZE)) {
      const response = await this.transport.query(iql.orgFilesByName(batch));
      for (const raw of response.data) {
        const row = validateInput(OrgFileRowSchema, raw);
        if (!uidsByName.has(row.name)) uidsByName.set(row.name, row.uid);
      }
    }

    const notFound = names.filter((n) => !uidsByName.has(n));
    if (notFound.length > 0) {
      throw filesNotFoundError(notFound, 'org');
    }

    this.log.info(`Adding ${uidsByName.size} files to ${collectionId}`);
    await this.transport.addFilesToCollection(collectionId, [...uidsByName.values()]);
  }

  private async queryCollectionByName(
    collectionId: string,
    names: readonly string[],
    skipText: boolean
  ): Promise<Map<string, RetrievedDocument>> {
    const found = new Map<string, RetrievedDocument>();
    for (const batch of chunk(names, NAME_QUERY_BATCH_SIZE)) {
      const docs = await this.queryDocumentsByName(iql.collectionDocumentsByName(collectionId, batch, skipText));
      for (const [name, doc] of docs) {
        if (!found.has(name)) found.set(name, doc);
      }
    }
    return found;
  }

  private async queryDocumentsByName(query: string): Promise<Map<string, RetrievedDocument>> {
    const response = await this.transport.query(query);
    const byName = new Map<string, RetrievedDocument>();
    for (const raw of response.data) {
      const doc = validateInput(RetrievedDocumentSchema, raw);
      if (!byName.has(doc.name)) byName.set(doc.name, doc);
    }
    return byName;
  }
}
