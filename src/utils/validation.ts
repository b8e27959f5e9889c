/**
 * Zod Validation Helpers and Tool Input Schemas
 *
 * Every external input (manifest files, MCP tool parameters, CLI flags) goes
 * through one of these schemas before it reaches the sync engine.
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

function summarize(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError with a `path: message; ...` summary
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(summarize(result.error));
  }
  return result.data;
}

/**
 * Validate without throwing
 */
export function safeValidateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown
): { success: true; data: T } | { success: false; error: ValidationError } {
  const result = schema.safeParse(input);
  if (!result.success) {
    return { success: false, error: new ValidationError(summarize(result.error)) };
  }
  return { success: true, data: result.data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS
// ═══════════════════════════════════════════════════════════════════════════════

export const QueryMode = z.enum(['iql', 'poll']);

// ═══════════════════════════════════════════════════════════════════════════════
// QUERY SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const QueryInput = z.object({
  query: z.string().min(1, 'Query is required'),
  mode: QueryMode.default('iql'),
  cursor: z.string().optional(),
  timeout: z.number().int().min(1).max(600).optional(),
});

export const CollectionFieldsInput = z.object({
  collection_id: z.string().min(1, 'Collection id is required'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// FILE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const UploadFilesInput = z.object({
  collection_id: z.string().min(1).optional(),
  files: z
    .array(
      z.object({
        name: z.string().min(1),
        path: z.string().min(1),
        uid: z.string().optional(),
      })
    )
    .min(1, 'At least one file is required'),
  wait: z.boolean().default(false),
});

export const PollResultsInput = z.object({
  collection_id: z.string().min(1),
  uids: z.array(z.string().min(1)).min(1),
});

// ═══════════════════════════════════════════════════════════════════════════════
// SYNC SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const BootstrapInput = z
  .object({
    data_dir: z.string().min(1, 'Data directory is required'),
    collection_prefix: z.string().min(1).optional(),
    collection_id: z.string().min(1).optional(),
    collection_name: z.string().min(1).optional(),
    skip_upload: z.boolean().default(false),
    add_files: z.boolean().default(false),
    skip_missing_files: z.boolean().default(false),
    skip_type_inference: z.boolean().default(false),
    skip_new_fields: z.boolean().default(false),
    empty_labels: z.boolean().default(false),
    max_fields: z.number().int().min(-1).default(-1),
    first_file: z.number().int().min(0).default(0),
    max_files: z.number().int().min(-1).default(-1),
    batch_size: z.number().int().min(1).default(50),
    first_batch: z.number().int().min(0).default(0),
    use_cache: z.boolean().default(true),
    cache_dir: z.string().min(1).optional(),
  })
  .refine(
    (v) =>
      [v.collection_prefix, v.collection_id, v.collection_name].filter((x) => x !== undefined).length <= 1,
    { message: 'collection_prefix, collection_id and collection_name are mutually exclusive' }
  );

export const SnapshotInput = z.object({
  collection_ids: z.array(z.string().min(1)).min(1, 'At least one collection id is required'),
  data_dir: z.string().min(1).optional(),
  original_names: z.boolean().default(false),
  labeled_files_only: z.boolean().default(false),
  filter_collection: z.string().min(1).optional(),
  label_filter: z.string().min(1).optional(),
  allow_low_confidence: z.boolean().default(false),
  field_mapping: z.string().optional(),
  download_files: z.boolean().default(false),
});

export const SnapshotCollectionsInput = z.object({
  data_dir: z.string().min(1).optional(),
  original_names: z.boolean().default(false),
});

export const CopyFieldsInput = z.object({
  source_collection_name: z.string().min(1),
  destination_collection_name: z.string().min(1),
});

export type QueryInput = z.infer<typeof QueryInput>;
export type UploadFilesInput = z.infer<typeof UploadFilesInput>;
export type BootstrapInput = z.infer<typeof BootstrapInput>;
export type SnapshotInput = z.infer<typeof SnapshotInput>;
