/**
 * Schema reconciliation
 *
 * Flattens the local DocSchema into fields, reads the collection's existing
 * fields back from the platform's schema tree, and decides per field whether
 * to create it, update it in place, or leave it alone because its existing
 * type disagrees. Field types may be narrowed from the entity evidence the
 * label builder attached.
 *
 * @module services/labeling/schema-reconciler
 */

import { z } from 'zod';
import {
  FieldType,
  buildFieldSpec,
  matchTrainer,
  type FieldSpec,
  type InferredFieldType,
} from '../../models/field-types.js';
import { labelKindToFieldType, type ScalarKind } from '../../models/labels.js';
import type { DocSchema, FieldSchema } from '../../models/schema.js';
import { isTableLabel, type ScalarLabelWire, type WireLabel } from '../../models/wire.js';
import type { PlatformTransport, SchemaNode } from '../platform/transport.js';
import * as iql from '../platform/iql.js';
import { entityFieldType, type LabelSet } from './label-builder.js';
import { chunk } from '../../utils/concurrency.js';
import { ValidationError } from '../../utils/validation.js';
import type { Logger } from '../../utils/logger.js';

export const FIELD_CREATION_BATCH_SIZE = 5;

/**
 * A field of the flattened schema. `path` lists ancestor table names.
 */
export interface SchemaField {
  name: string;
  path: string[];
  fieldType: InferredFieldType;
}

export interface SchemaConflict {
  field: string;
  path: string[];
  existingType: InferredFieldType;
  desiredType: InferredFieldType;
}

export interface ReconcileInput {
  schema: SchemaField[];
  labels: LabelSet[];
  currentFields: DocSchema;
  skipTypeInference?: boolean;
  skipNewFields?: boolean;
  /** -1 for no limit */
  maxFields?: number;
  log: Logger;
}

export interface ReconcilePlan {
  fieldsToCreate: SchemaField[];
  fieldSpecs: FieldSpec[];
  /** Names of every field (top level or nested) whose labels will be written */
  fieldNamesToUpdate: string[];
  /** Top-level fields sent in the update payload */
  fieldsToUpdate: SchemaField[];
  conflicts: SchemaConflict[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// LOCAL SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Tables come before their sub-fields; sub-fields carry the table in `path`
 */
export function generateSchema(docSchema: DocSchema): SchemaField[] {
  const fields: SchemaField[] = [];
  for (const [name, field] of Object.entries(docSchema.fields)) {
    if (field.type === 'table') {
      fields.push({ name, path: [], fieldType: 'table' });
      for (const sub of generateSchema(field.schema)) {
        fields.push({ ...sub, path: [name, ...sub.path] });
      }
    } else {
      fields.push({ name, path: [], fieldType: labelKindToFieldType(field.kind) });
    }
  }
  return fields;
}

// ═══════════════════════════════════════════════════════════════════════════════
// REMOTE SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const FieldCommentSchema = z
  .object({
    field_template: z.string().optional(),
    entity_class: z.string().optional(),
    infer_func: z.object({ trainer_name: z.string() }).passthrough().optional(),
  })
  .passthrough();

export type FieldComment = z.infer<typeof FieldCommentSchema>;

/**
 * Parse a field node's JSON comment. Nodes without one, or with one that is
 * not a JSON object, yield null.
 */
export function parseFieldComment(node: SchemaNode): FieldComment | null {
  if (node.comment === undefined) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(node.comment);
  } catch {
    return null;
  }
  const parsed = FieldCommentSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function filterInferredFields(nodes: readonly SchemaNode[]): SchemaNode[] {
  return nodes.filter((n) => parseFieldComment(n)?.field_template === 'inferred_field_spec');
}

function findPath(root: SchemaNode, ...path: string[]): SchemaNode {
  let current = root;
  for (const segment of path) {
    const next = (current.children ?? []).find((c) => c.name === segment);
    if (!next) {
      throw new ValidationError(`Field ${root.name} has no ${path.join('.')} in its schema`);
    }
    current = next;
  }
  return current;
}

function scalarKindFor(node: SchemaNode, trainer: InferredFieldType | undefined): ScalarKind {
  if (trainer === 'document_tag') return 'document_tag';

  if (trainer === 'checkbox' || trainer === 'signature') {
    const flagType = findPath(node, 'Label', 'Value', 'Value').fieldType;
    if (flagType === FieldType.bool || flagType === FieldType.text || flagType === FieldType.number) {
      return trainer;
    }
    throw new ValidationError(`Unknown ${trainer} value type for field ${node.name}: ${String(flagType)}`);
  }

  const scalarType = findPath(node, 'Label', 'Value').fieldType;
  switch (scalarType) {
    case FieldType.text:
      return 'text';
    case FieldType.number:
      return 'number';
    case FieldType.timestamp:
      return 'timestamp';
    default:
      throw new ValidationError(`Unknown scalar type for field ${node.name}: ${String(scalarType)}`);
  }
}

/**
 * Decode the platform's field nodes into a DocSchema
 *
 * @throws ValidationError for field shapes this system cannot represent
 */
export function fieldsToDocSchema(nodes: readonly SchemaNode[]): DocSchema {
  const fields: Record<string, FieldSchema> = {};
  for (const node of nodes) {
    const trainerName = parseFieldComment(node)?.infer_func?.trainer_name;
    const trainer = trainerName !== undefined ? matchTrainer(trainerName) : undefined;

    if (trainer === 'table') {
      const subFields = findPath(node, 'Label', 'Value', 'Label', 'Value').children ?? [];
      fields[node.name] = { type: 'table', schema: fieldsToDocSchema(subFields) };
    } else {
      fields[node.name] = { type: 'scalar', kind: scalarKindFor(node, trainer) };
    }
  }
  return { fields };
}

/**
 * The collection's inferred fields, read from its schema tree
 */
export async function fetchCurrentFields(transport: PlatformTransport, collectionId: string): Promise<DocSchema> {
  const response = await transport.query(iql.collectionSchema(collectionId));
  const children = response.schema?.children ?? [];
  return fieldsToDocSchema(filterInferredFields(children));
}

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE NARROWING
// ═══════════════════════════════════════════════════════════════════════════════

function collectFromLabel(label: WireLabel | undefined, field: SchemaField, depth: number, out: ScalarLabelWire[]): void {
  if (label === undefined) return;

  if (depth === field.path.length) {
    if (!isTableLabel(label)) out.push(label);
    return;
  }

  if (!isTableLabel(label)) return;
  const nextName = depth + 1 === field.path.length ? field.name : field.path[depth + 1];
  for (const row of label.Label.Value) {
    collectFromLabel(row.Label.Value[nextName], field, depth + 1, out);
  }
}

/**
 * Every scalar label written for `field` in one document, including labels
 * inside table rows
 */
export function collectFieldLabels(labels: LabelSet, field: SchemaField): ScalarLabelWire[] {
  const out: ScalarLabelWire[] = [];
  const rootName = field.path.length > 0 ? field.path[0] : field.name;
  collectFromLabel(labels[rootName], field, 0, out);
  return out;
}

const NARROWABLE_TYPES: ReadonlySet<InferredFieldType> = new Set(['text', 'number', 'timestamp']);

/**
 * Narrow a field's type from the entity types its labels carry. Timestamp
 * evidence beats number evidence; the first label whose evidence is only
 * text-like settles the field as text and ends the scan. Labels without
 * first-class entities leave the type alone.
 */
export function narrowFieldType(field: SchemaField, labelSets: readonly LabelSet[]): InferredFieldType {
  if (!NARROWABLE_TYPES.has(field.fieldType)) {
    return field.fieldType;
  }

  let fieldType = field.fieldType;
  for (const labels of labelSets) {
    for (const label of collectFieldLabels(labels, field)) {
      const types = new Set<InferredFieldType>();
      for (const entity of label.Context.Entities) {
        const t = entityFieldType(entity);
        if (t !== undefined) types.add(t);
      }
      if (types.size === 0) continue;

      if (types.has('timestamp')) {
        fieldType = 'timestamp';
      } else if (types.has('number')) {
        if (fieldType !== 'timestamp') fieldType = 'number';
      } else {
        return 'text';
      }
    }
  }
  return fieldType;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECONCILIATION
// ═══════════════════════════════════════════════════════════════════════════════

function existingTypeOf(field: FieldSchema): InferredFieldType {
  return field.type === 'table' ? 'table' : labelKindToFieldType(field.kind);
}

export function reconcileSchema(input: ReconcileInput): ReconcilePlan {
  const { schema, labels, currentFields, log } = input;
  const maxFields = input.maxFields ?? -1;
  const candidates = maxFields === -1 ? schema : schema.slice(0, maxFields);

  const fieldsToCreate: SchemaField[] = [];
  const fieldSpecs: FieldSpec[] = [];
  const conflicts: SchemaConflict[] = [];
  const toUpdate = new Set<string>();

  for (const field of candidates) {
    const fieldType = input.skipTypeInference ? field.fieldType : narrowFieldType(field, labels);
    if (fieldType !== field.fieldType) {
      log.debug(`Narrowed field ${field.name} from ${field.fieldType} to ${fieldType}`);
    }

    const existing =
      field.path.length > 0 ? currentFields.fields[field.path[0]] : currentFields.fields[field.name];

    if (existing !== undefined) {
      if (existing.type === 'table') {
        toUpdate.add(field.name);
        continue;
      }

      const existingType = existingTypeOf(existing);
      if (existingType !== fieldType) {
        log.warn(
          `Field ${field.name} already created with type ${existingType}, but we're setting it to a value of type ${fieldType}. You may want to delete it.`
        );
        conflicts.push({ field: field.name, path: field.path, existingType, desiredType: fieldType });
      } else {
        toUpdate.add(field.name);
      }
    } else if (!input.skipNewFields) {
      log.debug(`Creating field ${field.name}: type=${fieldType}, path=[${field.path.join(', ')}]`);
      fieldsToCreate.push({ ...field, fieldType });
      fieldSpecs.push(buildFieldSpec(fieldType, field.name, field.path));
      toUpdate.add(field.name);
    }
  }

  return {
    fieldsToCreate,
    fieldSpecs,
    fieldNamesToUpdate: [...toUpdate],
    fieldsToUpdate: schema.filter((f) => f.path.length === 0 && toUpdate.has(f.name)),
    conflicts,
  };
}

/**
 * Create fields a few at a time to bound request size
 */
export async function createFieldsInBatches(
  transport: PlatformTransport,
  collectionId: string,
  specs: readonly FieldSpec[],
  batchSize: number = FIELD_CREATION_BATCH_SIZE
): Promise<void> {
  for (const batch of chunk(specs, batchSize)) {
    await transport.createFields(collectionId, batch);
  }
}
