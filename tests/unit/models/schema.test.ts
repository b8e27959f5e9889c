/**
 * Document schema, record and manifest tests
 *
 * Manifest tests use a temp directory per test.
 *
 * @module tests/unit/models/schema
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  isDocumentTagOnly,
  loadManifest,
  parseDocSchema,
  parseRecord,
  recordToSchema,
  serializeDocSchema,
  serializeRecord,
  traverseRecord,
  writeManifest,
  type DocSchema,
} from '../../../src/models/schema.js';
import { ValidationError } from '../../../src/utils/validation.js';
import { SyncError } from '../../../src/server/errors.js';

const INVOICE_SCHEMA: DocSchema = parseDocSchema({
  fields: {
    'Invoice number': 'TextLabel',
    Total: 'NumberLabel',
    'Due date': 'TimestampLabel',
    Items: { fields: { Description: 'TextLabel', Amount: 'NumberLabel' } },
  },
});

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

describe('doc schemas', () => {
  it('parses scalar tags and nested tables', () => {
    expect(INVOICE_SCHEMA.fields['Total']).toEqual({ type: 'scalar', kind: 'number' });
    expect(INVOICE_SCHEMA.fields['Items']).toEqual({
      type: 'table',
      schema: {
        fields: {
          Description: { type: 'scalar', kind: 'text' },
          Amount: { type: 'scalar', kind: 'number' },
        },
      },
    });
  });

  it('serializes back to the manifest form', () => {
    expect(serializeDocSchema(INVOICE_SCHEMA)).toEqual({
      fields: {
        'Invoice number': 'TextLabel',
        Total: 'NumberLabel',
        'Due date': 'TimestampLabel',
        Items: { fields: { Description: 'TextLabel', Amount: 'NumberLabel' } },
      },
    });
  });

  it('rejects unknown field tags', () => {
    expect(() => parseDocSchema({ fields: { Rating: 'StarLabel' } })).toThrow(
      'Unknown field type "StarLabel" for field "Rating"'
    );
  });

  it('detects document-tag-only schemas', () => {
    expect(isDocumentTagOnly(parseDocSchema({ fields: { Kind: 'DocumentTagLabel' } }))).toBe(true);
    expect(isDocumentTagOnly(INVOICE_SCHEMA)).toBe(false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════════════════════

describe('records', () => {
  it('interprets values against the schema', () => {
    const record = parseRecord(
      {
        'Invoice number': { value: 'INV-7', location: { top: 0.1, left: 0.2, width: 0.1, height: 0.02 } },
        Total: { value: '1,024.00' },
        'Due date': { value: '2024-03-05' },
        Items: [{ Description: { value: 'Paper' }, Amount: { value: 12 } }],
      },
      INVOICE_SCHEMA
    );

    expect(record['Invoice number']).toEqual({
      kind: 'text',
      value: 'INV-7',
      location: { top: 0.1, left: 0.2, width: 0.1, height: 0.02, page: 0 },
      cell: null,
    });
    expect(record['Total']).toEqual({ kind: 'number', value: '1,024.00', location: null, cell: null });
    expect(record['Due date']).toEqual({ kind: 'timestamp', value: new Date(2024, 2, 5), location: null, cell: null });
    expect(record['Items']).toEqual([
      {
        Description: { kind: 'text', value: 'Paper', location: null, cell: null },
        Amount: { kind: 'number', value: 12, location: null, cell: null },
      },
    ]);
  });

  it('treats absent fields as null', () => {
    const record = parseRecord({ Total: { value: 3 } }, INVOICE_SCHEMA);
    expect(record['Invoice number']).toBeNull();
    expect(record['Items']).toBeNull();
  });

  it('rejects unknown fields', () => {
    expect(() => parseRecord({ Vendor: { value: 'x' } }, INVOICE_SCHEMA)).toThrow('Unknown field "Vendor" in record');
  });

  it('rejects nested objects where a table is expected', () => {
    expect(() => parseRecord({ Items: { Description: { value: 'x' } } }, INVOICE_SCHEMA)).toThrow(ValidationError);
  });

  it('rejects values that do not fit the kind', () => {
    expect(() => parseRecord({ Total: { value: true } }, INVOICE_SCHEMA)).toThrow(/Field "Total": invalid number value/);
  });

  it('writes timestamps in the unambiguous format', () => {
    const record = parseRecord({ 'Due date': { value: '2024-03-05' } }, INVOICE_SCHEMA);
    expect(serializeRecord(record)['Due date']).toEqual({ value: '2024-03-05' });
  });

  it('derives a schema from a record, skipping empty fields', () => {
    const record = parseRecord(
      { Total: { value: 3 }, Items: [{ Description: { value: 'Pens' } }] },
      INVOICE_SCHEMA
    );
    expect(recordToSchema(record)).toEqual({
      fields: {
        Total: { type: 'scalar', kind: 'number' },
        Items: { type: 'table', schema: { fields: { Description: { type: 'scalar', kind: 'text' } } } },
      },
    });
  });

  it('visits table cells depth first', () => {
    const record = parseRecord(
      {
        Total: { value: 3 },
        Items: [{ Description: { value: 'A' } }, { Description: { value: 'B' }, Amount: { value: 2 } }],
      },
      INVOICE_SCHEMA
    );
    const visited: string[] = [];
    traverseRecord(record, (label, name) => visited.push(`${name}=${String(label.value)}`));
    expect(visited).toEqual(['Total=3', 'Description=A', 'Description=B', 'Amount=2']);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// MANIFEST FILES
// ═══════════════════════════════════════════════════════════════════════════════

describe('manifest files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docintel-manifest-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('fails when there is no manifest', async () => {
    await expect(loadManifest(dir)).rejects.toBeInstanceOf(SyncError);
  });

  it('resolves local files and drops documents that cannot be found', async () => {
    await fs.writeFile(path.join(dir, 'a.pdf'), 'pdf');
    await fs.writeFile(
      path.join(dir, 'manifest.json'),
      JSON.stringify({
        doc_schema: { fields: { Total: 'NumberLabel' } },
        docs: [
          { fname: 'a.pdf', record: { Total: { value: 5 } } },
          { fname: 'gone.pdf', record: null },
          { fname: 'remote.pdf', url: 'https://files.test/remote.pdf' },
        ],
      })
    );

    const manifest = await loadManifest(dir);

    expect(manifest.docs).toEqual([
      { fname: path.join(dir, 'a.pdf'), url: null, record: { Total: { kind: 'number', value: 5, location: null, cell: null } } },
      { fname: path.join(dir, 'remote.pdf'), url: 'https://files.test/remote.pdf', record: null },
    ]);
  });

  it('reads back what it writes', async () => {
    const record = parseRecord({ 'Due date': { value: '2023-12-31' }, Total: { value: 9.5 } }, INVOICE_SCHEMA);
    await fs.writeFile(path.join(dir, 'b.pdf'), 'pdf');

    const written = await writeManifest(dir, { docSchema: INVOICE_SCHEMA, docs: [{ fname: 'b.pdf', url: null, record }] });
    const loaded = await loadManifest(dir);

    expect(written).toBe(path.join(dir, 'manifest.json'));
    expect(loaded.docSchema).toEqual(INVOICE_SCHEMA);
    expect(loaded.docs[0].record).toEqual(record);
  });
});
