/**
 * In-process platform for sync tests
 *
 * Holds collections, files and their OCR payloads in memory and answers the
 * query strings the engine builds. Every call is recorded so tests can
 * assert on what was sent.
 */

import { InvalidRequestError } from '../../../src/services/platform/errors.js';
import { matchTrainer, type FieldSpec } from '../../../src/models/field-types.js';
import type {
  PlatformTransport,
  QueryOptions,
  QueryResponse,
  ResourceType,
  SchemaNode,
  UpdateRecord,
  UploadFile,
} from '../../../src/services/platform/transport.js';
import type { PlatformEntity, PlatformWord } from '../../../src/models/wire.js';

export interface FakeOcr {
  words: PlatformWord[];
  entities: PlatformEntity[];
}

export interface FakeFile {
  uid: string;
  name: string;
  ocr: FakeOcr;
  downloadUrl: string;
  /** Poll calls left before the file reports as preprocessed */
  pendingPolls: number;
}

export interface FakeCollection {
  id: string;
  name: string;
  fileUids: string[];
  fields: FieldSpec[];
  /** Raw rows returned for the collection rows query, keyed by uid */
  rows: Map<string, Record<string, unknown>>;
  /** Field values written through update, keyed by uid */
  values: Map<string, Record<string, unknown>>;
}

type QueryHandler = (query: string, options: QueryOptions) => QueryResponse | undefined;

const EMPTY_OCR: FakeOcr = { words: [], entities: [] };

function listIn(query: string, key: string): string[] | null {
  const marker = `in(${key}, `;
  const start = query.indexOf(marker);
  if (start === -1) return null;
  const end = query.indexOf(')', start);
  const body = query.slice(start + marker.length, end);
  return [...body.matchAll(/"((?:[^"\\]|\\.)*)"/g)].map((m) => m[1].replace(/\\(.)/g, '$1'));
}

function trainerName(spec: FieldSpec): string {
  return (spec.expression ?? '').split('(')[0].replace(/`/g, '');
}

export class FakeTransport implements PlatformTransport {
  readonly collections = new Map<string, FakeCollection>();
  readonly files = new Map<string, FakeFile>();
  /** OCR payload produced for a file name when it is uploaded */
  readonly ocrByName = new Map<string, FakeOcr>();

  readonly queries: Array<{ query: string; options: QueryOptions }> = [];
  readonly uploads: Array<{ collectionId: string | null; files: UploadFile[] }> = [];
  readonly updateCalls: Array<{ collectionId: string; records: UpdateRecord[] }> = [];
  readonly appliedRecords: UpdateRecord[] = [];
  readonly createFieldCalls: Array<{ collectionId: string; specs: FieldSpec[] }> = [];
  readonly addedFiles: Array<{ collectionId: string; fileIds: string[] }> = [];

  modelVersionRows: Array<{ field_name: string; model_version: number }> = [];
  /** Poll calls a freshly uploaded file takes to finish preprocessing */
  processingPolls = 0;
  /** Called before each update is applied; throw to fail the request */
  onUpdate: ((records: UpdateRecord[]) => void) | null = null;

  private handlers: QueryHandler[] = [];
  private nextId = 1;

  // ═══════════════════════════════════════════════════════════════════════════
  // SETUP
  // ═══════════════════════════════════════════════════════════════════════════

  addCollection(name: string, id: string = `col-${this.nextId++}`): FakeCollection {
    const collection: FakeCollection = {
      id,
      name,
      fileUids: [],
      fields: [],
      rows: new Map(),
      values: new Map(),
    };
    this.collections.set(id, collection);
    return collection;
  }

  /**
   * Add an already-processed file, optionally as a member of a collection
   */
  addFile(name: string, collectionId: string | null, ocr: FakeOcr = EMPTY_OCR): FakeFile {
    const uid = `file-${this.nextId++}`;
    const file: FakeFile = { uid, name, ocr, downloadUrl: `https://files.test/${uid}`, pendingPolls: 0 };
    this.files.set(uid, file);
    if (collectionId !== null) this.collection(collectionId).fileUids.push(uid);
    return file;
  }

  /**
   * Answer matching queries before the built-in routing. Return undefined
   * from the handler to fall through.
   */
  respond(handler: QueryHandler): void {
    this.handlers.push(handler);
  }

  collection(id: string): FakeCollection {
    const collection = this.collections.get(id);
    if (!collection) throw new Error(`No fake collection ${id}`);
    return collection;
  }

  queriesMatching(fragment: string): string[] {
    return this.queries.map((q) => q.query).filter((q) => q.includes(fragment));
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // TRANSPORT
  // ═══════════════════════════════════════════════════════════════════════════

  async query(query: string, options: QueryOptions = {}): Promise<QueryResponse> {
    this.queries.push({ query, options });

    for (const handler of this.handlers) {
      const response = handler(query, options);
      if (response !== undefined) return response;
    }

    if (query.startsWith('@__system::ecs')) {
      return { data: this.modelVersionRows };
    }
    if (query.includes('[increment:')) {
      return { data: [{ increment: 0 }] };
    }
    if (query.includes('[sum_mv:')) {
      return { data: [{ sum_mv: 0 }] };
    }
    if (query.startsWith('@files[name: File.name, uid]')) {
      const names = listIn(query, 'File.name') ?? [];
      const rows = [...this.files.values()].filter((f) => names.includes(f.name)).map((f) => ({ name: f.name, uid: f.uid }));
      return { data: rows };
    }

    const fcByName = /^@file_collections name="([^"]*)"$/.exec(query);
    if (fcByName) {
      const rows = [...this.collections.values()]
        .filter((c) => c.name === fcByName[1])
        .map((c) => ({ uid: c.id, name: c.name, field_ec: `file_collections::${c.id}` }));
      return { data: rows };
    }

    const ref = /^@`file_collections::([^`]+)`/.exec(query);
    if (ref) {
      return this.collectionQuery(this.collection(ref[1]), query.slice(ref[0].length), options);
    }

    throw new Error(`FakeTransport cannot answer query: ${query}`);
  }

  async uploadFiles(collectionId: string | null, files: UploadFile[]): Promise<string[]> {
    this.uploads.push({ collectionId, files });
    return files.map((f) => {
      const file = this.addFile(f.name, collectionId, this.ocrByName.get(f.name) ?? EMPTY_OCR);
      file.pendingPolls = this.processingPolls;
      return file.uid;
    });
  }

  async update(collectionId: string, records: UpdateRecord[]): Promise<string[]> {
    this.updateCalls.push({ collectionId, records: [...records] });
    this.onUpdate?.(records);
    const collection = this.collection(collectionId);
    for (const record of records) {
      const { uid, ...fields } = record;
      collection.values.set(uid, { ...(collection.values.get(uid) ?? {}), ...fields });
      this.appliedRecords.push(record);
    }
    return records.map((r) => r.uid);
  }

  async createFields(collectionId: string, specs: FieldSpec[]): Promise<void> {
    this.createFieldCalls.push({ collectionId, specs: [...specs] });
    this.collection(collectionId).fields.push(...specs);
  }

  async addFilesToCollection(collectionId: string, fileIds: string[]): Promise<void> {
    this.addedFiles.push({ collectionId, fileIds: [...fileIds] });
    const collection = this.collection(collectionId);
    for (const uid of fileIds) {
      if (!collection.fileUids.includes(uid)) collection.fileUids.push(uid);
    }
  }

  async createCollection(name: string): Promise<string> {
    if ([...this.collections.values()].some((c) => c.name === name)) {
      throw new InvalidRequestError(`A collection named ${name} already exists`);
    }
    return this.addCollection(name).id;
  }

  async getCollectionId(name: string): Promise<string | null> {
    return [...this.collections.values()].find((c) => c.name === name)?.id ?? null;
  }

  getAppUrl(resourceType: ResourceType, resourceId: string): string {
    return `https://app.test/o/test-org/${resourceType}/${resourceId}`;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // QUERY ROUTING
  // ═══════════════════════════════════════════════════════════════════════════

  private collectionQuery(collection: FakeCollection, rest: string, options: QueryOptions): QueryResponse {
    if (rest === ' limit:0') {
      return { data: [], schema: { name: collection.name, children: this.schemaNodes(collection) } };
    }

    if (rest === '') {
      return {
        data: collection.fileUids.map((uid) => collection.rows.get(uid) ?? { uid }),
        schema: { name: collection.name, children: this.schemaNodes(collection) },
      };
    }

    if (rest === '[uid]') {
      return { data: collection.fileUids.map((uid) => ({ uid })) };
    }

    if (rest.startsWith('[uid, name: File.name')) {
      const names = listIn(rest, 'File.name');
      const uids = listIn(rest, 'uid');
      const preprocessedOnly = rest.includes('File.IsPreprocessed=true');
      const polling = options.mode === 'poll';

      const matched = collection.fileUids
        .map((uid) => this.files.get(uid))
        .filter((f): f is FakeFile => f !== undefined)
        .filter((f) => (names === null || names.includes(f.name)) && (uids === null || uids.includes(f.uid)));

      if (polling) {
        for (const f of matched) {
          if (f.pendingPolls > 0) f.pendingPolls--;
        }
      }

      const docs = matched
        .filter((f) => !preprocessedOnly || f.pendingPolls === 0)
        .map((f) => ({ uid: f.uid, name: f.name, text: { words: f.ocr.words }, entities: f.ocr.entities }));

      if (polling) {
        return { data: docs.map((d) => ({ action: 'insert', data: d })), cursor: `cursor-${this.queries.length}` };
      }
      return { data: docs };
    }

    throw new Error(`FakeTransport cannot answer collection query: ${rest}`);
  }

  /**
   * Field nodes shaped the way the platform reports each inferred type
   */
  private schemaNodes(collection: FakeCollection): SchemaNode[] {
    const comment = (spec: FieldSpec): string =>
      JSON.stringify({
        field_template: 'inferred_field_spec',
        entity_class: `file_collections::${collection.id}`,
        infer_func: { trainer_name: trainerName(spec) },
      });

    const node = (spec: FieldSpec): SchemaNode => {
      const base = { name: spec.field, comment: comment(spec) };
      switch (matchTrainer(trainerName(spec))) {
        case 'table': {
          const subNodes = collection.fields.filter((s) => s.path?.[0] === spec.field).map(node);
          return {
            ...base,
            children: [{ name: 'Label', children: [{ name: 'Value', children: [{ name: 'Label', children: [{ name: 'Value', children: subNodes }] }] }] }],
          };
        }
        case 'checkbox':
        case 'signature':
          return { ...base, children: [{ name: 'Label', children: [{ name: 'Value', children: [{ name: 'Value', fieldType: 'BOOL' }] }] }] };
        case 'document_tag':
          return { ...base, children: [] };
        default:
          return { ...base, children: [{ name: 'Label', children: [{ name: 'Value', fieldType: spec.type }] }] };
      }
    };

    const system: SchemaNode = { name: '__system', children: [] };
    return [system, ...collection.fields.filter((s) => (s.path ?? []).length === 0).map(node)];
  }
}
