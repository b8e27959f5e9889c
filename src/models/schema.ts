/**
 * Document schemas, records and manifests
 *
 * A DocSchema maps field names to either a scalar kind or a nested DocSchema
 * (a table: a list of rows, each row a record of the nested schema). Nested
 * objects that are not lists are not supported.
 *
 * Records are interpreted against the schema directly; nothing here builds
 * types at run time.
 *
 * @module models/schema
 */

import * as path from 'path';
import { z } from 'zod';
import { CellSchema, LocationSchema } from './location.js';
import {
  KIND_TO_MANIFEST_TAG,
  manifestTagToKind,
  toTriState,
  type ScalarKind,
  type ScalarLabel,
} from './labels.js';
import { parseDate, formatUnambiguousDate } from '../utils/dates.js';
import { ValidationError, validateInput } from '../utils/validation.js';
import { fileExists, readJsonFile, writeJsonFile } from '../utils/files.js';
import { pathNotFoundError } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type FieldSchema = { type: 'scalar'; kind: ScalarKind } | { type: 'table'; schema: DocSchema };

export interface DocSchema {
  fields: Record<string, FieldSchema>;
}

export type FieldValue = ScalarLabel | DocRecord[] | null;

export interface DocRecord {
  [field: string]: FieldValue;
}

/**
 * One document's locally-known state. `record` is null for documents that
 * are uploaded but carry no labels.
 */
export interface DocData {
  /** Path (or bare name) of the source file */
  fname: string;
  url: string | null;
  record: DocRecord | null;
}

export interface DocManifest {
  docSchema: DocSchema;
  docs: DocData[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// MANIFEST JSON FORM
// ═══════════════════════════════════════════════════════════════════════════════

export interface DocSchemaJson {
  fields: Record<string, string | DocSchemaJson>;
}

const DocSchemaJsonSchema: z.ZodType<DocSchemaJson> = z.lazy(() =>
  z.object({
    fields: z.record(z.union([z.string(), DocSchemaJsonSchema])),
  })
);

const ManifestJsonSchema = z.object({
  doc_schema: DocSchemaJsonSchema,
  docs: z.array(
    z.object({
      fname: z.string().min(1),
      url: z.string().nullable().optional(),
      record: z.unknown().optional(),
    })
  ),
});

export const MANIFEST_FILE_NAME = 'manifest.json';

export function parseDocSchema(raw: unknown): DocSchema {
  const json = validateInput(DocSchemaJsonSchema, raw);
  return fromSchemaJson(json);
}

function fromSchemaJson(json: DocSchemaJson): DocSchema {
  const fields: Record<string, FieldSchema> = {};
  for (const [name, value] of Object.entries(json.fields)) {
    if (typeof value === 'string') {
      const kind = manifestTagToKind(value);
      if (kind === undefined) {
        throw new ValidationError(`Unknown field type "${value}" for field "${name}"`);
      }
      fields[name] = { type: 'scalar', kind };
    } else {
      fields[name] = { type: 'table', schema: fromSchemaJson(value) };
    }
  }
  return { fields };
}

export function serializeDocSchema(schema: DocSchema): DocSchemaJson {
  const fields: Record<string, string | DocSchemaJson> = {};
  for (const [name, field] of Object.entries(schema.fields)) {
    fields[name] = field.type === 'scalar' ? KIND_TO_MANIFEST_TAG[field.kind] : serializeDocSchema(field.schema);
  }
  return { fields };
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════════════════════

const RawLabelSchema = z.object({
  value: z.unknown().optional(),
  location: LocationSchema.nullable().optional(),
  cell: CellSchema.nullable().optional(),
});

const TextValue = z.string().nullable();
const NumberValue = z.union([z.number(), z.string()]).nullable();
const TimestampValue = z.union([z.string(), z.date()]).nullable();
const FlagValue = z.union([z.boolean(), z.number()]).nullable();
const TagValue = z.union([z.string(), z.array(z.string())]).nullable();

function parseScalar(raw: unknown, kind: ScalarKind, fieldName: string): ScalarLabel {
  const parsed = validateInput(RawLabelSchema, raw);
  const base = { location: parsed.location ?? null, cell: parsed.cell ?? null };
  const value = parsed.value ?? null;

  try {
    switch (kind) {
      case 'text':
        return { kind, value: TextValue.parse(value), ...base };
      case 'number':
        return { kind, value: NumberValue.parse(value), ...base };
      case 'timestamp': {
        const ts = TimestampValue.parse(value);
        return { kind, value: typeof ts === 'string' ? parseDate(ts) : ts, ...base };
      }
      case 'checkbox':
      case 'signature':
        return { kind, value: toTriState(FlagValue.parse(value)), ...base };
      case 'document_tag':
        return { kind, value: TagValue.parse(value), ...base };
    }
  } catch (error) {
    const message = error instanceof z.ZodError ? error.errors.map((e) => e.message).join('; ') : String(error);
    throw new ValidationError(`Field "${fieldName}": invalid ${kind} value: ${message}`);
  }
}

/**
 * Interpret a raw (JSON) record against a schema.
 *
 * @throws ValidationError on unknown fields, nested objects, or values that
 * do not fit the field's kind
 */
export function parseRecord(raw: unknown, schema: DocSchema): DocRecord {
  const obj = validateInput(z.record(z.unknown()), raw);

  for (const name of Object.keys(obj)) {
    if (!(name in schema.fields)) {
      throw new ValidationError(`Unknown field "${name}" in record`);
    }
  }

  const record: DocRecord = {};
  for (const [name, field] of Object.entries(schema.fields)) {
    const value = obj[name];
    if (value === undefined || value === null) {
      record[name] = null;
      continue;
    }

    if (field.type === 'table') {
      if (!Array.isArray(value)) {
        throw new ValidationError(`Unsupported: nested (object) field "${name}"; tables must be lists of rows`);
      }
      record[name] = value.map((row) => parseRecord(row, field.schema));
    } else {
      if (Array.isArray(value)) {
        throw new ValidationError(`Field "${name}" is a scalar field but holds a list`);
      }
      record[name] = parseScalar(value, field.kind, name);
    }
  }
  return record;
}

function serializeScalar(label: ScalarLabel): Record<string, unknown> {
  let value: unknown;
  switch (label.kind) {
    case 'timestamp':
      value = label.value === null ? null : formatUnambiguousDate(label.value);
      break;
    default:
      value = label.value;
  }
  const out: Record<string, unknown> = { value };
  if (label.location) out.location = label.location;
  if (label.cell) out.cell = label.cell;
  return out;
}

/**
 * JSON form of a record, using the unambiguous format for every value
 */
export function serializeRecord(record: DocRecord): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(record)) {
    if (value === null) {
      out[name] = null;
    } else if (Array.isArray(value)) {
      out[name] = value.map((row) => serializeRecord(row));
    } else {
      out[name] = serializeScalar(value);
    }
  }
  return out;
}

/**
 * Derive a schema from a record. Tables take their shape from the first
 * row; fields with no value carry no type information and are left out.
 */
export function recordToSchema(record: DocRecord): DocSchema {
  const fields: Record<string, FieldSchema> = {};
  for (const [name, value] of Object.entries(record)) {
    if (value === null) continue;
    if (Array.isArray(value)) {
      if (value.length === 0) continue;
      fields[name] = { type: 'table', schema: recordToSchema(value[0]) };
    } else {
      fields[name] = { type: 'scalar', kind: value.kind };
    }
  }
  return { fields };
}

/**
 * Visit every scalar label in a record, depth first, in field order
 */
export function traverseRecord(record: DocRecord, fn: (label: ScalarLabel, fieldName: string) => void): void {
  for (const [name, value] of Object.entries(record)) {
    if (value === null) continue;
    if (Array.isArray(value)) {
      for (const row of value) traverseRecord(row, fn);
    } else {
      fn(value, name);
    }
  }
}

/**
 * True when every scalar field in the schema (tables included) is a
 * document tag. Such collections need no OCR text to be labeled.
 */
export function isDocumentTagOnly(schema: DocSchema): boolean {
  return Object.values(schema.fields).every((f) => f.type === 'scalar' && f.kind === 'document_tag');
}

// ═══════════════════════════════════════════════════════════════════════════════
// MANIFEST FILES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Read `<dir>/manifest.json`. Document paths are resolved against `dir`;
 * documents with neither a local file nor a URL are dropped. Records are
 * parsed once the schema is known.
 *
 * @throws SyncError PATH_NOT_FOUND when there is no manifest
 */
export async function loadManifest(dir: string): Promise<DocManifest> {
  const manifestPath = path.join(dir, MANIFEST_FILE_NAME);
  if (!(await fileExists(manifestPath))) {
    throw pathNotFoundError(manifestPath);
  }

  const json = validateInput(ManifestJsonSchema, await readJsonFile(manifestPath));
  const docSchema = fromSchemaJson(json.doc_schema);

  const docs: DocData[] = [];
  for (const doc of json.docs) {
    const fname = path.resolve(dir, doc.fname);
    const url = doc.url ?? null;
    if (url === null && !(await fileExists(fname))) {
      continue;
    }
    const record = doc.record === undefined || doc.record === null ? null : parseRecord(doc.record, docSchema);
    docs.push({ fname, url, record });
  }

  return { docSchema, docs };
}

/**
 * Write a manifest to `<dir>/manifest.json`. Document names are written as
 * given (callers pass names relative to `dir`).
 */
export async function writeManifest(dir: string, manifest: DocManifest): Promise<string> {
  const manifestPath = path.join(dir, MANIFEST_FILE_NAME);
  await writeJsonFile(manifestPath, {
    doc_schema: serializeDocSchema(manifest.docSchema),
    docs: manifest.docs.map((d) => {
      const out: Record<string, unknown> = { fname: d.fname };
      if (d.url !== null) out.url = d.url;
      out.record = d.record === null ? null : serializeRecord(d.record);
      return out;
    }),
  });
  return manifestPath;
}
