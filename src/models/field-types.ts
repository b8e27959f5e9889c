/**
 * Platform field types
 *
 * FieldType is the storage type of a field; InferredFieldType is the
 * extraction type the platform trains for it. Every inferred type is defined
 * by the trainer expression the platform runs and the storage type it yields.
 *
 * @module models/field-types
 */

export const FieldType = {
  text: 'STRING',
  number: 'NUMBER',
  bool: 'BOOL',
  timestamp: 'TIMESTAMP',
  entity: 'ENTITY',
} as const;

export type FieldType = (typeof FieldType)[keyof typeof FieldType];

export const INFERRED_FIELD_TYPES = [
  'text',
  'number',
  'timestamp',
  'checkbox',
  'signature',
  'table',
  'document_tag',
] as const;

export type InferredFieldType = (typeof INFERRED_FIELD_TYPES)[number];

interface InferredFieldDefinition {
  expression: string;
  type: FieldType;
  isList?: boolean;
}

export const INFERRED_FIELD_DEFINITIONS: Record<InferredFieldType, InferredFieldDefinition> = {
  text: { expression: '`text_string-dev-1`(File.text)', type: FieldType.text },
  number: { expression: '`text_number-dev-1`(File.text)', type: FieldType.number },
  timestamp: { expression: '`text_date-dev-1`(File.text)', type: FieldType.timestamp },
  checkbox: { expression: 'checkbox(File.text)', type: FieldType.text },
  signature: { expression: 'region_signature(File.text)', type: FieldType.text },
  table: { expression: 'entity_one_many(File.text)', type: FieldType.entity, isList: true },
  document_tag: { expression: 'document_tag(File)', type: FieldType.entity, isList: true },
};

/**
 * Field definition sent to the platform's field-creation endpoint
 */
export interface FieldSpec {
  /** The field's name */
  field: string;
  type: FieldType;
  expression?: string;
  /** Ancestor table names for a sub-field of a table */
  path?: string[];
  isList?: boolean;
}

/**
 * Build a field spec for an inferred field type. For a field inside a table
 * named `T`, pass `path = ['T']`.
 */
export function buildFieldSpec(inferredType: InferredFieldType, fieldName: string, path: string[] = []): FieldSpec {
  const definition = INFERRED_FIELD_DEFINITIONS[inferredType];
  const spec: FieldSpec = {
    field: fieldName,
    path: [...path],
    type: definition.type,
    expression: definition.expression,
  };
  if (definition.isList !== undefined) {
    spec.isList = definition.isList;
  }
  return spec;
}

/**
 * Resolve a trainer name (as found in a field's `infer_func`) to the single
 * inferred type whose expression mentions it.
 *
 * @throws Error when no type or more than one type matches
 */
export function matchTrainer(trainerName: string): InferredFieldType {
  const matches = INFERRED_FIELD_TYPES.filter((t) =>
    INFERRED_FIELD_DEFINITIONS[t].expression.includes(trainerName)
  );
  if (matches.length === 0) {
    throw new Error(`Unknown trainer: ${trainerName}`);
  }
  if (matches.length > 1) {
    throw new Error(`Matched multiple trainers for ${trainerName}: ${matches.join(', ')}`);
  }
  return matches[0];
}
