/**
 * Snapshot
 *
 * The inverse of a sync run: reads a collection's fields and confirmed
 * labels back into a DocSchema and local records, ready to be written as a
 * manifest. Predictions are skipped unless the row matches a label filter.
 *
 * @module services/labeling/snapshot
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import { combineLocations, type Location } from '../../models/location.js';
import { toTriState, type ScalarKind, type ScalarLabel } from '../../models/labels.js';
import { writeManifest, type DocData, type DocRecord, type DocSchema, type FieldSchema } from '../../models/schema.js';
import {
  IncomingScalarLabelSchema,
  IncomingTableLabelSchema,
  type IncomingScalarLabel,
  type PlatformWord,
} from '../../models/wire.js';
import type { PlatformTransport } from '../platform/transport.js';
import * as iql from '../platform/iql.js';
import { fieldsToDocSchema, filterInferredFields } from './schema-reconciler.js';
import { parseDate } from '../../utils/dates.js';
import { mapWithConcurrency } from '../../utils/concurrency.js';
import { ensureDirectory } from '../../utils/files.js';
import { ValidationError, validateInput } from '../../utils/validation.js';
import { errorMessage, type Logger } from '../../utils/logger.js';
import { validationError } from '../../server/errors.js';

export type FieldMapping = Readonly<Record<string, string>>;

export interface RowToRecordOptions {
  allowPredictions: boolean;
  allowLowConfidence: boolean;
  fieldMapping?: FieldMapping;
}

export interface SnapshotRecord {
  name: string;
  url: string | null;
  record: DocRecord | null;
}

export interface SnapshotResult {
  docSchema: DocSchema;
  records: SnapshotRecord[];
}

export interface SnapshotOptions {
  useOriginalFilenames?: boolean;
  labeledFilesOnly?: boolean;
  /** Keep only files that are also in this collection */
  filterCollectionId?: string;
  /** Rows matching this filter have their predictions treated as confirmed */
  labelFilter?: string;
  allowLowConfidence?: boolean;
  fieldMapping?: FieldMapping;
  log: Logger;
}

const FileRowSchema = z
  .object({
    uid: z.string(),
    File: z.object({
      name: z.string(),
      download_url: z.string().nullish(),
    }),
  })
  .passthrough();

type FileRow = z.infer<typeof FileRowSchema>;

const UidRowSchema = z.object({ uid: z.string() });

const FlagValueSchema = z.union([
  z.object({ Value: z.union([z.boolean(), z.number()]).nullish() }).passthrough(),
  z.boolean(),
  z.number(),
]);

const TagValueSchema = z.union([
  z.string(),
  z.array(
    z.object({
      Label: z.object({
        Value: z.string(),
        IsPrediction: z.boolean().nullish(),
      }),
    })
  ),
]);

// ═══════════════════════════════════════════════════════════════════════════════
// FIELD MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Parse `src:dst,src2:dst2`. Pairs with an empty side are ignored.
 */
export function parseFieldMapping(text: string): Record<string, string> {
  const mapping: Record<string, string> = {};
  for (const pair of text.split(',')) {
    const sep = pair.indexOf(':');
    if (sep === -1) continue;
    const src = pair.slice(0, sep).trim();
    const dst = pair.slice(sep + 1).trim();
    if (src && dst) mapping[src] = dst;
  }
  return mapping;
}

function mappedName(name: string, mapping: FieldMapping | undefined): string {
  return mapping?.[name] ?? name;
}

export function mapDocSchema(schema: DocSchema, mapping: FieldMapping | undefined): DocSchema {
  if (!mapping) return schema;
  const fields: Record<string, FieldSchema> = {};
  for (const [name, field] of Object.entries(schema.fields)) {
    fields[mappedName(name, mapping)] =
      field.type === 'table' ? { type: 'table', schema: mapDocSchema(field.schema, mapping) } : field;
  }
  return { fields };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ROW DECODING
// ═══════════════════════════════════════════════════════════════════════════════

function sourceWords(label: IncomingScalarLabel): PlatformWord[] {
  const source = label.Label.Source;
  return Array.isArray(source) ? source : [];
}

function sourceLocation(label: IncomingScalarLabel): Location | null {
  const source = label.Label.Source;
  if (!source) return null;
  if (Array.isArray(source)) {
    if (source.length === 0) return null;
    return combineLocations(...source.map((w) => ({ ...w.location, uids: [w.uid] })));
  }
  return source.BBoxes.length > 0 ? combineLocations(...source.BBoxes) : null;
}

function sourceText(label: IncomingScalarLabel): string | null {
  const words = sourceWords(label);
  return words.length > 0 ? words.map((w) => w.word).join(' ') : null;
}

function parseNumberText(text: string): number {
  const cleaned = text.replace(/[^0-9.eE+-]/g, '');
  const n = Number(cleaned);
  if (cleaned === '' || !Number.isFinite(n)) {
    throw new ValidationError(`Not a number: "${text}"`);
  }
  return n;
}

function decodeTags(raw: unknown, allowPredictions: boolean): string | string[] | null {
  const tags = validateInput(TagValueSchema, raw);
  if (typeof tags === 'string') return tags;
  const values = tags.filter((t) => allowPredictions || !t.Label.IsPrediction).map((t) => t.Label.Value);
  if (values.length === 0) return null;
  return values.length === 1 ? values[0] : values;
}

function decodeScalar(kind: ScalarKind, label: IncomingScalarLabel, allowPredictions: boolean): ScalarLabel {
  const location = sourceLocation(label);
  const raw = label.Label.Value;
  const hasValue = raw !== undefined && raw !== null;

  switch (kind) {
    case 'text': {
      const value = hasValue ? validateInput(z.union([z.string(), z.number()]), raw) : sourceText(label);
      return { kind, value: value === null ? null : String(value), location };
    }
    case 'number': {
      if (hasValue) {
        const value = validateInput(z.union([z.number(), z.string()]), raw);
        return { kind, value: typeof value === 'number' ? value : parseNumberText(value), location };
      }
      const text = sourceText(label);
      return { kind, value: text === null ? null : parseNumberText(text), location };
    }
    case 'timestamp': {
      const text = hasValue ? validateInput(z.string(), raw) : sourceText(label);
      return { kind, value: text === null ? null : parseDate(text), location };
    }
    case 'checkbox':
    case 'signature': {
      if (!hasValue) return { kind, value: null, location };
      const flag = validateInput(FlagValueSchema, raw);
      return { kind, value: toTriState(typeof flag === 'object' ? flag.Value : flag), location };
    }
    case 'document_tag':
      return { kind, value: hasValue ? decodeTags(raw, allowPredictions) : null, location };
  }
}

/**
 * Decode one collection row against the collection's schema. Fields are
 * renamed through `fieldMapping`. Returns null when no field carries a
 * usable label.
 *
 * @throws when a label does not fit its field's type
 */
export function rowToRecord(
  row: Readonly<Record<string, unknown>>,
  docSchema: DocSchema,
  options: RowToRecordOptions
): DocRecord | null {
  const record: DocRecord = {};
  let labeled = false;

  for (const [fieldName, field] of Object.entries(docSchema.fields)) {
    const value = row[fieldName];
    const outName = mappedName(fieldName, options.fieldMapping);

    if (field.type === 'table') {
      if (value === undefined || value === null) continue;
      const table = validateInput(IncomingTableLabelSchema, value);
      const rows: DocRecord[] = [];
      for (const tableRow of table.Label.Value) {
        const sub = rowToRecord(tableRow.Label.Value ?? {}, field.schema, options);
        if (sub !== null) rows.push(sub);
      }
      if (rows.length === 0) continue;
      record[outName] = rows;
      labeled = true;
      continue;
    }

    if (value === undefined || value === null) {
      record[outName] = null;
      continue;
    }

    const label = validateInput(IncomingScalarLabelSchema, value);
    if (label.Label.IsPrediction) {
      if (!options.allowPredictions) continue;
      if (label.Label.IsConfident !== true && !options.allowLowConfidence) continue;
    }

    record[outName] = decodeScalar(field.kind, label, options.allowPredictions);
    labeled = true;
  }

  return labeled ? record : null;
}

/**
 * `name-uid.ext`, or the original name when asked
 */
export function rowToFileName(row: FileRow, useOriginalFilename: boolean): string {
  const name = row.File.name;
  if (useOriginalFilename) return name;
  const dot = name.lastIndexOf('.');
  return dot <= 0 ? `${name}-${row.uid}` : `${name.slice(0, dot)}-${row.uid}${name.slice(dot)}`;
}

function assertUniqueNames(records: readonly SnapshotRecord[]): void {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const r of records) {
    if (seen.has(r.name)) duplicates.add(r.name);
    seen.add(r.name);
  }
  if (duplicates.size > 0) {
    throw validationError('Expected each filename to be unique', { duplicates: [...duplicates] });
  }
}

async function queryUids(transport: PlatformTransport, query: string): Promise<Set<string>> {
  const response = await transport.query(query);
  return new Set(response.data.map((raw) => validateInput(UidRowSchema, raw).uid));
}

// ═══════════════════════════════════════════════════════════════════════════════
// COLLECTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export async function snapshotCollection(
  transport: PlatformTransport,
  collectionId: string,
  options: SnapshotOptions
): Promise<SnapshotResult> {
  const { log } = options;
  const response = await transport.query(iql.collectionRows(collectionId));
  const docSchema = fieldsToDocSchema(filterInferredFields(response.schema?.children ?? []));

  const keep = options.filterCollectionId
    ? await queryUids(transport, iql.collectionFileUids(options.filterCollectionId))
    : null;
  const confirmed = options.labelFilter
    ? await queryUids(transport, iql.collectionFileUids(collectionId, options.labelFilter))
    : null;

  let records: SnapshotRecord[] = [];
  for (const raw of response.data) {
    const row = validateInput(FileRowSchema, raw);
    if (keep && !keep.has(row.uid)) continue;

    const name = rowToFileName(row, options.useOriginalFilenames ?? false);
    let record: DocRecord | null;
    try {
      record = rowToRecord(row, docSchema, {
        allowPredictions: confirmed?.has(row.uid) ?? false,
        allowLowConfidence: options.allowLowConfidence ?? false,
        fieldMapping: options.fieldMapping,
      });
    } catch (error) {
      log.warn(`Skipping labels of ${name}: ${errorMessage(error)}`);
      record = null;
    }
    records.push({ name, url: row.File.download_url ?? null, record });
  }

  if (options.labeledFilesOnly) {
    records = records.filter((r) => r.record !== null);
  }
  assertUniqueNames(records);

  return { docSchema: mapDocSchema(docSchema, options.fieldMapping), records };
}

/**
 * Snapshot several collections into one manifest. Later collections win
 * when two define the same field.
 */
export async function snapshotManyCollections(
  transport: PlatformTransport,
  collectionIds: readonly string[],
  options: SnapshotOptions
): Promise<SnapshotResult> {
  const fields: Record<string, FieldSchema> = {};
  const records: SnapshotRecord[] = [];
  for (const collectionId of collectionIds) {
    options.log.info(`Snapshotting collection ${transport.getAppUrl('fc', collectionId)}`);
    const result = await snapshotCollection(transport, collectionId, options);
    Object.assign(fields, result.docSchema.fields);
    records.push(...result.records);
  }
  return { docSchema: { fields }, records };
}

export async function listCollectionIds(
  transport: PlatformTransport,
  options: { nameFilter?: string; exclude?: readonly string[] } = {}
): Promise<string[]> {
  const exclude = new Set(options.exclude ?? []);
  const uids = await queryUids(transport, iql.collectionIds(options.nameFilter));
  return [...uids].filter((uid) => !exclude.has(uid));
}

// ═══════════════════════════════════════════════════════════════════════════════
// COLLECTION MEMBERSHIP
// ═══════════════════════════════════════════════════════════════════════════════

export const DOC_TAG_FIELD = 'Doc tag';
export const SAMPLED_TAG_FIELD = 'Sampled tag';
const SAMPLES_PER_COLLECTION = 2;

const MembershipRowSchema = z.object({
  collection_uid: z.string(),
  files: z
    .array(z.string())
    .nullish()
    .transform((v) => v ?? []),
});

const CollectionNameRowSchema = z.object({
  collection_uid: z.string(),
  name: z.string(),
});

/**
 * Label every file in the org with the collection it belongs to.
 *
 * `Doc tag` holds the collection of files in exactly one collection, an
 * empty tag for files in none, and nothing for files in several.
 * `Sampled tag` marks up to two single-collection files per collection.
 */
export async function snapshotCollections(
  transport: PlatformTransport,
  options: { useOriginalFilenames?: boolean } = {}
): Promise<SnapshotResult> {
  const files = (await transport.query(iql.orgFilesWithDownloadUrls())).data.map((raw) =>
    validateInput(FileRowSchema, raw)
  );
  const memberships = (await transport.query(iql.collectionMembership())).data.map((raw) =>
    validateInput(MembershipRowSchema, raw)
  );

  const names = new Map<string, string>();
  for (const raw of (await transport.query(iql.collectionNames())).data) {
    const row = validateInput(CollectionNameRowSchema, raw);
    names.set(row.collection_uid, row.name);
  }
  const collectionName = (uid: string): string => names.get(uid) ?? uid;

  const membership = new Map<string, string[]>();
  for (const c of memberships) {
    for (const fileUid of c.files) {
      const list = membership.get(fileUid) ?? [];
      list.push(c.collection_uid);
      membership.set(fileUid, list);
    }
  }

  const sampled = new Map<string, string>();
  for (const c of memberships) {
    const singles = c.files.filter((f) => membership.get(f)?.length === 1);
    for (const fileUid of singles.slice(0, SAMPLES_PER_COLLECTION)) {
      sampled.set(fileUid, c.collection_uid);
    }
  }

  const records = files.map((row): SnapshotRecord => {
    const collections = membership.get(row.uid);
    const sample = sampled.get(row.uid);
    let docTag: ScalarLabel | null = null;
    if (collections === undefined) {
      docTag = { kind: 'document_tag', value: null };
    } else if (collections.length === 1) {
      docTag = { kind: 'document_tag', value: collectionName(collections[0]) };
    }
    return {
      name: rowToFileName(row, options.useOriginalFilenames ?? false),
      url: row.File.download_url ?? null,
      record: {
        [DOC_TAG_FIELD]: docTag,
        [SAMPLED_TAG_FIELD]: sample === undefined ? null : { kind: 'document_tag', value: collectionName(sample) },
      },
    };
  });

  assertUniqueNames(records);

  return {
    docSchema: {
      fields: {
        [DOC_TAG_FIELD]: { type: 'scalar', kind: 'document_tag' },
        [SAMPLED_TAG_FIELD]: { type: 'scalar', kind: 'document_tag' },
      },
    },
    records,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// OUTPUT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Manifest documents for a snapshot. Downloaded files are referenced by
 * name alone; the rest keep their URL.
 */
export function snapshotDocs(records: readonly SnapshotRecord[], downloaded: boolean): DocData[] {
  return records.map((r) => ({
    fname: r.name,
    url: downloaded ? null : r.url,
    record: r.record,
  }));
}

/**
 * Download every record's file into `dir`
 */
export async function downloadFiles(
  records: readonly SnapshotRecord[],
  dir: string,
  parallelism: number
): Promise<void> {
  await mapWithConcurrency(records, parallelism, async (r) => {
    if (r.url === null) {
      throw validationError(`File ${r.name} has no download URL`);
    }
    const response = await fetch(r.url);
    if (!response.ok) {
      throw validationError(`Download of ${r.name} failed with status ${response.status}`);
    }
    await fs.writeFile(path.join(dir, r.name), new Uint8Array(await response.arrayBuffer()));
  });
}

/**
 * `<data>/capture/<first collection>-<4 hex>`
 */
export function captureWorkdir(dataDir: string, collectionId: string): string {
  return path.join(dataDir, 'capture', `${collectionId}-${uuidv4().replace(/-/g, '').slice(0, 4)}`);
}

/**
 * `<data>/collections/<4 hex>`
 */
export function collectionsWorkdir(dataDir: string): string {
  return path.join(dataDir, 'collections', uuidv4().slice(0, 4));
}

/**
 * Write a snapshot's manifest into `workdir`, downloading the files first
 * when asked
 *
 * @returns the manifest path
 */
export async function writeSnapshot(
  workdir: string,
  result: SnapshotResult,
  options: { downloadFiles?: boolean; parallelism: number; log: Logger }
): Promise<string> {
  await ensureDirectory(workdir);
  const download = options.downloadFiles ?? false;
  if (download) {
    options.log.info(`Downloading ${result.records.length} files to ${workdir}`);
    await downloadFiles(result.records, workdir, options.parallelism);
  }
  return writeManifest(workdir, { docSchema: result.docSchema, docs: snapshotDocs(result.records, download) });
}
