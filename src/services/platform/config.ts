/**
 * Platform connection configuration
 *
 * Values come from DOCINTEL_* environment variables (loaded from .env by
 * the entry points) and may be overridden per call.
 */

import * as os from 'os';
import { z } from 'zod';

export const DEFAULT_BASE_URL = 'https://app.docintel.io';
export const DEFAULT_COLLECTION_PREFIX = 'docintel-cli';

export const PlatformConfigSchema = z.object({
  apiToken: z.string().min(1, 'DOCINTEL_API_TOKEN is required'),
  orgName: z.string().min(1, 'DOCINTEL_ORG_NAME is required'),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),

  // Per-request ceiling for plain (non-poll) requests
  requestTimeoutMs: z.number().int().positive().default(120_000),

  dataDir: z.string().min(1).default('./data'),
  collectionPrefix: z.string().min(1).default(DEFAULT_COLLECTION_PREFIX),
  parallelism: z.number().int().positive().default(os.availableParallelism()),

  retry: z
    .object({
      rateLimitDelayMs: z.number().default(1000),
      uploadRateLimitDelayMs: z.number().default(2000),
      maxUploadAttempts: z.number().int().positive().default(60),
    })
    .default({}),

  // Long-poll settings (per request timeout in seconds, request ceiling)
  poll: z
    .object({
      timeoutSeconds: z.number().int().positive().default(60),
      maxAttempts: z.number().int().positive().default(10),
    })
    .default({}),
});

export type PlatformConfig = z.infer<typeof PlatformConfigSchema>;
export type PlatformConfigInput = z.input<typeof PlatformConfigSchema>;

function intFromEnv(name: string): number | undefined {
  const raw = process.env[name];
  return raw ? parseInt(raw, 10) : undefined;
}

/**
 * Load configuration from environment variables
 */
export function loadPlatformConfig(overrides?: Partial<PlatformConfigInput>): PlatformConfig {
  const envConfig: PlatformConfigInput = {
    apiToken: process.env.DOCINTEL_API_TOKEN || '',
    orgName: process.env.DOCINTEL_ORG_NAME || '',
    baseUrl: process.env.DOCINTEL_BASE_URL || DEFAULT_BASE_URL,
    requestTimeoutMs: intFromEnv('DOCINTEL_REQUEST_TIMEOUT_MS'),
    dataDir: process.env.DOCINTEL_DATA_DIR || undefined,
    collectionPrefix: process.env.DOCINTEL_COLLECTION_PREFIX || undefined,
    parallelism: intFromEnv('DOCINTEL_PARALLELISM'),
  };

  const merged: Record<string, unknown> = { ...envConfig };
  for (const [key, value] of Object.entries(overrides ?? {})) {
    if (value !== undefined) merged[key] = value;
  }
  return PlatformConfigSchema.parse(merged);
}
