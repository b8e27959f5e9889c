/**
 * Bootstrap a collection from a manifest directory
 *
 * @module services/labeling/bootstrap
 */

import * as path from 'path';
import { loadManifest } from '../../models/schema.js';
import type { PlatformConfig } from '../platform/config.js';
import type { PlatformTransport } from '../platform/transport.js';
import type { Logger } from '../../utils/logger.js';
import { SyncOrchestrator, type SyncOptions, type SyncReport } from './orchestrator.js';

export interface BootstrapOptions extends Omit<SyncOptions, 'cacheDir'> {
  /** Cache retrieved documents (skip-upload runs only) */
  useCache?: boolean;
  /** Where the cache lives; `<dataDir>/cache` when unset */
  cacheDir?: string;
}

/**
 * What a bootstrap run needs from the platform context. Any PlatformContext
 * fits; tests pass a fake transport.
 */
export interface BootstrapContext {
  config: PlatformConfig;
  client: PlatformTransport;
  log: Logger;
}

export async function bootstrap(
  ctx: BootstrapContext,
  manifestDir: string,
  options: BootstrapOptions = {}
): Promise<SyncReport> {
  const { config, client, log } = ctx;
  const { useCache = true, cacheDir, ...syncOptions } = options;

  const manifest = await loadManifest(manifestDir);
  log.info(`Loaded ${manifest.docs.length} documents from ${manifestDir}`);

  const selectsCollection =
    syncOptions.collectionId !== undefined ||
    syncOptions.collectionName !== undefined ||
    syncOptions.collectionPrefix !== undefined;

  const orchestrator = new SyncOrchestrator(client, log);
  return orchestrator.run(manifest.docSchema, manifest.docs, {
    ...syncOptions,
    collectionPrefix: selectsCollection ? syncOptions.collectionPrefix : config.collectionPrefix,
    parallelism: syncOptions.parallelism ?? config.parallelism,
    cacheDir: useCache ? (cacheDir ?? path.join(config.dataDir, 'cache')) : null,
    pollTimeoutSeconds: syncOptions.pollTimeoutSeconds ?? config.poll.timeoutSeconds,
    pollMaxAttempts: syncOptions.pollMaxAttempts ?? config.poll.maxAttempts,
  });
}
