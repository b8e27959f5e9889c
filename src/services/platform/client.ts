/**
 * Platform HTTP client
 *
 * Talks to one org's v2 API with the global fetch. Transient conditions
 * (request timeout with budget left, rate limits) are retried here; every
 * other non-success response raises APIError.
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

import { type PlatformConfig } from './config.js';
import { APIError, InvalidRequestError, PollTimeoutError, QueryError } from './errors.js';
import * as iql from './iql.js';
import {
  PollEventSchema,
  QueryResponseSchema,
  type Mutation,
  type PlatformTransport,
  type QueryOptions,
  type QueryResponse,
  type ResourceType,
  type UpdateRecord,
  type UploadFile,
  type UploadResult,
} from './transport.js';
import { buildFieldSpec, type FieldSpec, type InferredFieldType } from '../../models/field-types.js';
import { getMimeType, readFileBuffer } from '../../utils/files.js';
import { sleep } from '../../utils/concurrency.js';
import { validateInput } from '../../utils/validation.js';
import { type Logger } from '../../utils/logger.js';

const UidsResponseSchema = z.object({
  uids: z.array(z.string()).nullish(),
  upload_uids: z.array(z.string()).nullish(),
});

const UidRowSchema = z.object({ uid: z.string() });

const SplitResultSchema = z.object({
  uid: z.string(),
  upload_uid: z.string(),
});

interface RequestOptions {
  json?: unknown;
  form?: FormData;
  timeoutMs?: number;
}

/**
 * Join URL segments, dropping leading slashes from each
 */
export function urljoin(...parts: string[]): string {
  return parts.map((p) => p.replace(/^\/+/, '')).join('/');
}

/**
 * True for bare paths and file:// URLs
 */
export function isLocalPath(p: string): boolean {
  const match = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//.exec(p);
  return match === null || match[1].toLowerCase() === 'file';
}

export function buildFileObject(
  name: string,
  filePath?: string,
  uid?: string,
  mutate?: Mutation
): Record<string, unknown> {
  const file: Record<string, unknown> = { name };
  if (filePath !== undefined) file.path = filePath;
  if (mutate !== undefined) file.mutate = mutate;

  const out: Record<string, unknown> = { File: file };
  if (uid !== undefined) out.uid = uid;
  return out;
}

export class PlatformClient implements PlatformTransport {
  readonly orgUrl: string;
  readonly apiUrl: string;

  constructor(
    private readonly config: PlatformConfig,
    private readonly log: Logger
  ) {
    this.orgUrl = urljoin(config.baseUrl, 'o', config.orgName);
    this.apiUrl = urljoin(this.orgUrl, 'api/v2');
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // QUERIES
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Run a query. `mode: 'poll'` blocks until the results change (or the
   * timeout passes) and reports changes since `cursor`.
   *
   * @throws QueryError when the platform reports an error for the query
   */
  async query(query: string, options: QueryOptions = {}): Promise<QueryResponse> {
    const mode = options.mode ?? 'iql';
    const args: Record<string, unknown> = { query };
    if (options.cursor !== undefined) args.cursor = options.cursor;
    if (options.timeout !== undefined) args.timeout = options.timeout;

    const budgetSeconds = options.timeout ?? this.config.requestTimeoutMs / 1000;
    const start = Date.now();

    for (;;) {
      const response = await this.request('POST', urljoin(this.apiUrl, mode), {
        json: args,
        timeoutMs: this.requestTimeoutFor(args.timeout),
      });
      const elapsed = (Date.now() - start) / 1000;

      if (response.ok) {
        const body = validateInput(QueryResponseSchema, await response.json());
        if (body.error !== undefined && body.error !== null) {
          throw new QueryError(typeof body.error === 'string' ? body.error : JSON.stringify(body.error), query);
        }
        return { data: body.data, cursor: body.cursor, schema: body.schema };
      }

      if (response.status === 408 && options.timeout !== undefined && elapsed < budgetSeconds) {
        args.timeout = Math.ceil(budgetSeconds - elapsed);
        this.log.warn(`Request timed out, but still have ${args.timeout}s left. Will try again...`);
        continue;
      }

      if (response.status === 429 && elapsed < budgetSeconds - 1) {
        if (options.timeout !== undefined) {
          args.timeout = Math.ceil(budgetSeconds - 1 - elapsed);
        }
        this.log.warn(`Hit a rate limit with ${Math.ceil(budgetSeconds - 1 - elapsed)}s left. Will sleep and try again...`);
        await sleep(this.config.retry.rateLimitDelayMs);
        continue;
      }

      throw await this.apiError(response);
    }
  }

  async ping(): Promise<void> {
    await this.query(iql.ping());
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // FILES
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Upload local files (multipart) or URLs (JSON). A single call must not
   * mix the two. Pass `null` to upload into the org without a collection.
   */
  async uploadFiles(collectionId: string | null, files: UploadFile[]): Promise<UploadResult> {
    const local = files.filter((f) => isLocalPath(f.path)).length;
    if (local > 0 && local !== files.length) {
      throw new InvalidRequestError(
        `All files must be local or URLs, but not a mix (${local}/${files.length} were local)`
      );
    }
    return local > 0 ? this.uploadMultipart(collectionId, files) : this.uploadUrls(collectionId, files);
  }

  async addFilesToCollection(collectionId: string, fileIds: string[]): Promise<void> {
    const response = await this.request('POST', this.resourceUrl('ec', 'file_collection_contents'), {
      json: { data: fileIds.map((u) => ({ file_uid: u, collection_uid: collectionId })) },
    });
    if (!response.ok) throw await this.apiError(response);
  }

  async renameFile(uid: string, name: string): Promise<string[]> {
    return this.setFieldPath('files', uid, ['File', 'name'], name);
  }

  /**
   * Yield processed rows for each uid as it becomes available. Ends once
   * every uid has been seen.
   *
   * @throws PollTimeoutError when the poll ceiling passes first
   */
  async *pollForResults(collectionId: string, uids: string[]): AsyncGenerator<unknown> {
    const query = iql.processedResults(collectionId, uids);
    const mustSee = new Set(uids);
    let cursor: string | undefined;

    for (let attempt = 0; mustSee.size > 0; attempt++) {
      if (attempt >= this.config.poll.maxAttempts) {
        throw new PollTimeoutError(`Timed out waiting for ${mustSee.size} file(s) to process`, [...mustSee]);
      }
      const response = await this.query(query, { mode: 'poll', cursor, timeout: this.config.poll.timeoutSeconds });
      for (const raw of response.data) {
        const event = validateInput(PollEventSchema, raw);
        if (event.action !== 'insert') continue;

        const { uid } = validateInput(UidRowSchema.passthrough(), event.data);
        if (!uids.includes(uid)) {
          throw new Error(`Broken uid filter (${uid} not in ${[...mustSee].join(', ')})`);
        }
        mustSee.delete(uid);
        yield event.data;
      }
      cursor = response.cursor ?? undefined;
    }
  }

  /**
   * Yield the uids of documents split out of the given uploads
   */
  async *fetchSplitResults(uploadUids: string[], timeout: number = this.config.poll.timeoutSeconds): AsyncGenerator<string> {
    const query = iql.splitResults(uploadUids);
    const mustSee = new Set(uploadUids);
    let cursor: string | undefined;

    for (let attempt = 0; mustSee.size > 0; attempt++) {
      if (attempt >= this.config.poll.maxAttempts) {
        throw new PollTimeoutError(`Timed out waiting for ${mustSee.size} upload(s) to split`, [...mustSee]);
      }
      const response = await this.query(query, { mode: 'poll', cursor, timeout });
      for (const raw of response.data) {
        const event = validateInput(PollEventSchema, raw);
        if (event.action !== 'insert') continue;

        const row = validateInput(SplitResultSchema, event.data);
        mustSee.delete(row.upload_uid);
        yield row.uid;
      }
      cursor = response.cursor ?? undefined;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // COLLECTIONS AND FIELDS
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * @returns the collection's uid, or null when no collection has the name
   * @throws InvalidRequestError when several collections share the name
   */
  async getCollectionId(name: string): Promise<string | null> {
    const response = await this.query(iql.collectionIdByName(name));
    const uids = response.data.map((row) => validateInput(UidRowSchema, row).uid);
    if (uids.length === 0) return null;
    if (uids.length > 1) {
      throw new InvalidRequestError(`Found multiple collections with name '${name}': ${uids.join(', ')}`);
    }
    return uids[0];
  }

  /**
   * Create an empty collection
   *
   * @throws InvalidRequestError when a collection with the name exists
   */
  async createCollection(name: string): Promise<string> {
    const existing = await this.getCollectionId(name);
    if (existing !== null) {
      throw new InvalidRequestError(`Collection with name '${name}' already exists at ${this.getAppUrl('fc', existing)}`);
    }

    // Creating a collection is an empty insert
    const response = await this.request('POST', this.resourceUrl('collection', encodeURIComponent(name)), {
      json: { data: [] },
    });
    if (!response.ok) throw await this.apiError(response);

    const { uids } = validateInput(UidsResponseSchema, await response.json());
    if (uids && uids.length > 0) {
      throw new InvalidRequestError(`Expected an empty uid list while creating a collection, got: ${uids.join(', ')}`);
    }

    const created = await this.getCollectionId(name);
    if (created === null) {
      throw new InvalidRequestError(`Collection '${name}' was not found after creating it`);
    }
    return created;
  }

  /**
   * Write field values. Each record names the file by `uid`.
   */
  async update(collectionId: string, records: UpdateRecord[]): Promise<string[]> {
    const response = await this.request('PATCH', `${this.resourceUrl('fc', collectionId)}?assert_updated=false`, {
      json: { data: records },
    });
    if (!response.ok) throw await this.apiError(response);

    const { uids } = validateInput(UidsResponseSchema, await response.json());
    return uids ?? [];
  }

  async createField(collectionId: string, spec: FieldSpec): Promise<void> {
    const response = await this.request('POST', this.fieldsUrl(collectionId), { json: spec });
    if (!response.ok) throw await this.apiError(response);
  }

  /**
   * Create several fields in one request
   */
  async createFields(collectionId: string, specs: FieldSpec[]): Promise<void> {
    const response = await this.request('POST', this.fieldsUrl(collectionId), { json: specs });
    if (!response.ok) throw await this.apiError(response);
  }

  async createInferredField(
    collectionId: string,
    fieldName: string,
    type: InferredFieldType,
    fieldPath: string[] = []
  ): Promise<void> {
    await this.createField(collectionId, buildFieldSpec(type, fieldName, fieldPath));
  }

  async deleteField(collectionId: string, fieldName: string): Promise<void> {
    const response = await this.request(
      'DELETE',
      urljoin(this.fieldsUrl(collectionId), encodeURIComponent(fieldName))
    );
    if (!response.ok) throw await this.apiError(response);
  }

  /**
   * Copy field definitions from another collection into this one
   */
  async importFields(collectionId: string, fromCollectionId: string): Promise<void> {
    const url = urljoin(
      this.apiUrl,
      'schema',
      'ecs',
      `file_collections::${collectionId}`,
      'importfields',
      `file_collections::${fromCollectionId}`
    );
    const response = await this.request('POST', url);
    if (!response.ok) throw await this.apiError(response);
  }

  getAppUrl(resourceType: ResourceType, resourceId: string): string {
    return urljoin(this.orgUrl, resourceType, resourceId);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════════

  private async uploadMultipart(collectionId: string | null, files: UploadFile[]): Promise<UploadResult> {
    for (const f of files) {
      if (f.uid !== undefined) {
        throw new InvalidRequestError(`Unsupported: specifying a uid in a multi-part file upload (${f.uid})`);
      }
    }

    const url = this.collectionUrl(collectionId, true);
    let last: Response | undefined;

    for (let attempt = 0; attempt < this.config.retry.maxUploadAttempts; attempt++) {
      const form = new FormData();
      for (const f of files) {
        const localPath = f.path.startsWith('file://') ? fileURLToPath(f.path) : f.path;
        const buffer = await readFileBuffer(localPath);
        form.append('file', new Blob([new Uint8Array(buffer)], { type: getMimeType(f.name) }), path.basename(f.name));
      }
      for (const f of files) {
        form.append('data', JSON.stringify(buildFileObject(f.name, undefined, undefined, f.mutate)));
      }

      const response = await this.request('POST', url, { form });
      if (response.status === 429) {
        last = response;
        this.log.warn('Rate limited during multi-part upload. Sleeping and then retrying...');
        await sleep(this.config.retry.uploadRateLimitDelayMs);
        continue;
      }
      if (!response.ok) throw await this.apiError(response);
      return this.handleUploadResponse(response);
    }

    if (last) throw await this.apiError(last);
    throw new InvalidRequestError('Upload was never attempted');
  }

  private async uploadUrls(collectionId: string | null, files: UploadFile[]): Promise<UploadResult> {
    const response = await this.request('POST', this.collectionUrl(collectionId, true), {
      json: { data: files.map((f) => buildFileObject(f.name, f.path, f.uid, f.mutate)) },
    });
    if (!response.ok) throw await this.apiError(response);
    return this.handleUploadResponse(response);
  }

  private async handleUploadResponse(response: Response): Promise<UploadResult> {
    const body = validateInput(UidsResponseSchema, await response.json());
    if (body.uids) return body.uids;
    if (body.upload_uids) return this.fetchSplitResults(body.upload_uids);
    return [];
  }

  private async setFieldPath(entityClass: string, uid: string, fieldPath: string[], data: unknown): Promise<string[]> {
    const url = urljoin(this.apiUrl, 'data', entityClass, uid, ...fieldPath.map((s) => encodeURIComponent(s)));
    const response = await this.request('POST', url, { json: { data } });
    if (!response.ok) throw await this.apiError(response);

    const { uids } = validateInput(UidsResponseSchema, await response.json());
    return uids ?? [];
  }

  private fieldsUrl(collectionId: string): string {
    return urljoin(this.apiUrl, `schema/ecs/file_collections::${collectionId}/fields`);
  }

  private collectionUrl(collectionId: string | null, useAsync: boolean): string {
    return collectionId !== null
      ? this.resourceUrl('fc', collectionId, useAsync)
      : this.resourceUrl('files', null, useAsync);
  }

  private resourceUrl(resourceType: ResourceType, resourceId: string | null, useAsync: boolean = false): string {
    const parts = [this.apiUrl, resourceType];
    if (resourceId !== null) parts.push(resourceId);
    const url = urljoin(...parts);
    return useAsync ? `${url}?async=1` : url;
  }

  /**
   * Poll requests stay open for their own timeout, so the socket deadline
   * must outlast it
   */
  private requestTimeoutFor(timeoutSeconds: unknown): number {
    const pollMs = typeof timeoutSeconds === 'number' ? (timeoutSeconds + 30) * 1000 : 0;
    return Math.max(this.config.requestTimeoutMs, pollMs);
  }

  private async request(method: string, url: string, options: RequestOptions = {}): Promise<Response> {
    const headers: Record<string, string> = { 'X-Access-Token': this.config.apiToken };
    let body: string | FormData | undefined;
    if (options.form !== undefined) {
      body = options.form;
    } else if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    this.log.debug(`${method} ${url}`);
    return fetch(url, {
      method,
      headers,
      body,
      signal: AbortSignal.timeout(options.timeoutMs ?? this.config.requestTimeoutMs),
    });
  }

  private async apiError(response: Response): Promise<APIError> {
    const body = await response.text();
    return new APIError(response.status, body, response.url);
  }
}
