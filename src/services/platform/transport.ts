/**
 * The request/response contract the sync engine needs from the platform.
 * PlatformClient implements it over HTTP; tests substitute an in-process fake.
 *
 * @module services/platform/transport
 */

import { z } from 'zod';
import type { FieldSpec } from '../../models/field-types.js';

export type QueryMode = 'iql' | 'poll';

export interface QueryOptions {
  mode?: QueryMode;
  cursor?: string;
  /** Seconds */
  timeout?: number;
}

/**
 * A node of the platform's field schema tree. Field nodes carry a JSON
 * `comment` describing how the field was created.
 */
export interface SchemaNode {
  name: string;
  fieldType?: string;
  comment?: string;
  children?: SchemaNode[];
}

export const SchemaNodeSchema: z.ZodType<SchemaNode> = z.lazy(() =>
  z.object({
    name: z.string(),
    fieldType: z.string().optional(),
    comment: z.string().optional(),
    children: z.array(SchemaNodeSchema).optional(),
  })
);

export const QueryResponseSchema = z.object({
  data: z
    .array(z.unknown())
    .nullish()
    .transform((v) => v ?? []),
  cursor: z.string().nullish(),
  schema: SchemaNodeSchema.nullish(),
  error: z.unknown().optional(),
});

export type QueryResponse = Omit<z.output<typeof QueryResponseSchema>, 'error'>;

/**
 * One change reported by a poll-mode query
 */
export const PollEventSchema = z.object({
  action: z.string(),
  data: z.unknown(),
});

export type PollEvent = z.infer<typeof PollEventSchema>;

export interface Mutation {
  rotate?: number;
  split?: string;
  remove_pages?: string;
  split_segments?: string[];
  rotate_segments?: Array<{ pages: string; degrees: number }>;
  split_exprs?: Record<string, string>;
}

/**
 * A local path or a URL the platform can fetch
 */
export interface UploadFile {
  name: string;
  path: string;
  uid?: string;
  mutate?: Mutation;
}

/**
 * Plain uploads report their uids directly; uploads whose mutations produce
 * a dynamic number of documents report them as they are split out.
 */
export type UploadResult = string[] | AsyncIterable<string>;

export interface UpdateRecord {
  uid: string;
  [field: string]: unknown;
}

export type ResourceType = 'fc' | 'dc' | 'ec' | 'collection' | 'files';

export interface PlatformTransport {
  query(query: string, options?: QueryOptions): Promise<QueryResponse>;
  uploadFiles(collectionId: string | null, files: UploadFile[]): Promise<UploadResult>;
  update(collectionId: string, records: UpdateRecord[]): Promise<string[]>;
  createFields(collectionId: string, specs: FieldSpec[]): Promise<void>;
  addFilesToCollection(collectionId: string, fileIds: string[]): Promise<void>;
  createCollection(name: string): Promise<string>;
  getCollectionId(name: string): Promise<string | null>;
  getAppUrl(resourceType: ResourceType, resourceId: string): string;
}

export async function collectUploadResult(result: UploadResult): Promise<string[]> {
  if (Array.isArray(result)) {
    return result;
  }
  const uids: string[] = [];
  for await (const uid of result) {
    uids.push(uid);
  }
  return uids;
}
