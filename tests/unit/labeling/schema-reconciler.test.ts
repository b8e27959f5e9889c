/**
 * Schema reconciliation tests
 *
 * Remote schemas come from FakeTransport, which lays out field nodes the
 * way the platform reports each inferred type.
 *
 * @module tests/unit/labeling/schema-reconciler
 */

import { describe, it, expect } from 'vitest';
import {
  collectFieldLabels,
  createFieldsInBatches,
  fetchCurrentFields,
  fieldsToDocSchema,
  filterInferredFields,
  generateSchema,
  narrowFieldType,
  reconcileSchema,
  type SchemaField,
} from '../../../src/services/labeling/schema-reconciler.js';
import type { LabelSet } from '../../../src/services/labeling/label-builder.js';
import { buildFieldSpec } from '../../../src/models/field-types.js';
import type { DocSchema } from '../../../src/models/schema.js';
import type { PlatformEntity, ScalarLabelWire } from '../../../src/models/wire.js';
import { FakeTransport } from '../helpers/fake-transport.js';
import { captureLogger, entity, messagesAt } from '../helpers/fixtures.js';

function wire(...entities: PlatformEntity[]): ScalarLabelWire {
  return { Label: { Source: [], IsPrediction: false }, ModelVersion: 0, Context: { Entities: entities } };
}

const DATE = entity('e-date', 'DATE', ['w1']);
const MONEY = entity('e-money', 'MONEY', ['w2']);
const TIME = entity('e-time', 'TIME', ['w3']);
const PERSON = entity('e-person', 'PERSON', ['w4']);

const field = (name: string, fieldType: SchemaField['fieldType'], path: string[] = []): SchemaField => ({
  name,
  path,
  fieldType,
});

// ═══════════════════════════════════════════════════════════════════════════════
// LOCAL SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

describe('generateSchema', () => {
  it('lists tables before their sub-fields', () => {
    const docSchema: DocSchema = {
      fields: {
        Total: { type: 'scalar', kind: 'number' },
        Items: {
          type: 'table',
          schema: { fields: { Description: { type: 'scalar', kind: 'text' }, Paid: { type: 'scalar', kind: 'checkbox' } } },
        },
      },
    };

    expect(generateSchema(docSchema)).toEqual([
      field('Total', 'number'),
      field('Items', 'table'),
      field('Description', 'text', ['Items']),
      field('Paid', 'checkbox', ['Items']),
    ]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// REMOTE SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

describe('remote schema', () => {
  it('decodes every inferred field type', async () => {
    const transport = new FakeTransport();
    transport.addCollection('invoices', 'col-1');
    await transport.createFields('col-1', [
      buildFieldSpec('text', 'Vendor'),
      buildFieldSpec('number', 'Total'),
      buildFieldSpec('timestamp', 'Due'),
      buildFieldSpec('checkbox', 'Paid'),
      buildFieldSpec('signature', 'Signed'),
      buildFieldSpec('document_tag', 'Kind'),
      buildFieldSpec('table', 'Items'),
      buildFieldSpec('number', 'Amount', ['Items']),
    ]);

    expect(await fetchCurrentFields(transport, 'col-1')).toEqual({
      fields: {
        Vendor: { type: 'scalar', kind: 'text' },
        Total: { type: 'scalar', kind: 'number' },
        Due: { type: 'scalar', kind: 'timestamp' },
        Paid: { type: 'scalar', kind: 'checkbox' },
        Signed: { type: 'scalar', kind: 'signature' },
        Kind: { type: 'scalar', kind: 'document_tag' },
        Items: { type: 'table', schema: { fields: { Amount: { type: 'scalar', kind: 'number' } } } },
      },
    });
  });

  it('keeps only fields created from an inferred field spec', () => {
    const nodes = [
      { name: 'File', children: [] },
      { name: 'Manual', comment: JSON.stringify({ field_template: 'manual' }) },
      { name: 'Broken', comment: 'not json' },
      { name: 'Total', comment: JSON.stringify({ field_template: 'inferred_field_spec' }) },
    ];
    expect(filterInferredFields(nodes).map((n) => n.name)).toEqual(['Total']);
  });

  it('rejects scalar storage types it cannot represent', () => {
    const node = {
      name: 'Blob',
      comment: JSON.stringify({ field_template: 'inferred_field_spec', infer_func: { trainer_name: 'text_string-dev-1' } }),
      children: [{ name: 'Label', children: [{ name: 'Value', fieldType: 'BYTES' }] }],
    };
    expect(() => fieldsToDocSchema([node])).toThrow('Unknown scalar type for field Blob: BYTES');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE NARROWING
// ═══════════════════════════════════════════════════════════════════════════════

describe('narrowFieldType', () => {
  it('narrows text to timestamp on DATE evidence', () => {
    expect(narrowFieldType(field('Issued', 'text'), [{ Issued: wire(DATE) }])).toBe('timestamp');
  });

  it('lets timestamp evidence beat number evidence in any order', () => {
    const f = field('When', 'text');
    expect(narrowFieldType(f, [{ When: wire(MONEY) }, { When: wire(DATE) }])).toBe('timestamp');
    expect(narrowFieldType(f, [{ When: wire(DATE) }, { When: wire(MONEY) }])).toBe('timestamp');
  });

  it('settles on text at the first label with only text-like evidence', () => {
    const f = field('When', 'number');
    expect(narrowFieldType(f, [{ When: wire(DATE) }, { When: wire(TIME) }, { When: wire(DATE) }])).toBe('text');
  });

  it('ignores labels without first-class entities', () => {
    expect(narrowFieldType(field('Total', 'number'), [{ Total: wire(PERSON) }, { Total: wire() }, {}])).toBe('number');
  });

  it('never narrows flags, tags or tables', () => {
    expect(narrowFieldType(field('Paid', 'checkbox'), [{ Paid: wire(DATE) }])).toBe('checkbox');
  });

  it('reads sub-field labels from table rows', () => {
    const labels: LabelSet = {
      Items: {
        Label: {
          IsPrediction: false,
          Value: [
            { Label: { IsPrediction: false, Value: { Amount: wire(MONEY) } } },
            { Label: { IsPrediction: false, Value: { Amount: wire() } } },
          ],
        },
        ModelVersion: 0,
      },
    };
    const amount = field('Amount', 'text', ['Items']);

    expect(collectFieldLabels(labels, amount)).toHaveLength(2);
    expect(narrowFieldType(amount, [labels])).toBe('number');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// RECONCILIATION
// ═══════════════════════════════════════════════════════════════════════════════

describe('reconcileSchema', () => {
  const schema = [field('Total', 'number'), field('Note', 'text'), field('Date', 'timestamp')];
  const labels: LabelSet[] = [{ Note: wire(DATE) }];
  const currentFields: DocSchema = {
    fields: { Total: { type: 'scalar', kind: 'number' }, Note: { type: 'scalar', kind: 'text' } },
  };

  it('creates new fields, updates matching ones and reports conflicts', () => {
    const { log, lines } = captureLogger();
    const plan = reconcileSchema({ schema, labels, currentFields, log });

    expect(plan).toEqual({
      fieldsToCreate: [field('Date', 'timestamp')],
      fieldSpecs: [buildFieldSpec('timestamp', 'Date')],
      fieldNamesToUpdate: ['Total', 'Date'],
      fieldsToUpdate: [field('Total', 'number'), field('Date', 'timestamp')],
      conflicts: [{ field: 'Note', path: [], existingType: 'text', desiredType: 'timestamp' }],
    });
    expect(messagesAt(lines, 'warn')).toEqual([
      "Field Note already created with type text, but we're setting it to a value of type timestamp. You may want to delete it.",
    ]);
  });

  it('keeps declared types when inference is skipped', () => {
    const plan = reconcileSchema({ schema, labels, currentFields, skipTypeInference: true, log: captureLogger().log });
    expect(plan.conflicts).toEqual([]);
    expect(plan.fieldNamesToUpdate).toEqual(['Total', 'Note', 'Date']);
  });

  it('creates nothing when new fields are skipped', () => {
    const plan = reconcileSchema({ schema, labels, currentFields, skipNewFields: true, log: captureLogger().log });
    expect(plan.fieldSpecs).toEqual([]);
    expect(plan.fieldNamesToUpdate).toEqual(['Total']);
  });

  it('considers only the first maxFields fields', () => {
    const plan = reconcileSchema({ schema, labels, currentFields, maxFields: 1, log: captureLogger().log });
    expect(plan.fieldNamesToUpdate).toEqual(['Total']);
    expect(plan.fieldSpecs).toEqual([]);
  });

  it('updates the sub-fields of an existing table through the table', () => {
    const tableSchema = [field('Items', 'table'), field('Amount', 'number', ['Items'])];
    const plan = reconcileSchema({
      schema: tableSchema,
      labels: [],
      currentFields: { fields: { Items: { type: 'table', schema: { fields: {} } } } },
      log: captureLogger().log,
    });

    expect(plan.fieldNamesToUpdate).toEqual(['Items', 'Amount']);
    expect(plan.fieldsToUpdate).toEqual([field('Items', 'table')]);
    expect(plan.fieldSpecs).toEqual([]);
  });

  it('creates a new table together with its sub-fields', () => {
    const tableSchema = [field('Items', 'table'), field('Amount', 'number', ['Items'])];
    const plan = reconcileSchema({ schema: tableSchema, labels: [], currentFields: { fields: {} }, log: captureLogger().log });

    expect(plan.fieldSpecs).toEqual([buildFieldSpec('table', 'Items'), buildFieldSpec('number', 'Amount', ['Items'])]);
  });
});

describe('createFieldsInBatches', () => {
  it('sends at most five specs per request', async () => {
    const transport = new FakeTransport();
    transport.addCollection('c', 'col-1');
    const specs = ['A', 'B', 'C', 'D', 'E', 'F', 'G'].map((name) => buildFieldSpec('text', name));

    await createFieldsInBatches(transport, 'col-1', specs);

    expect(transport.createFieldCalls.map((c) => c.specs.length)).toEqual([5, 2]);
  });
});
