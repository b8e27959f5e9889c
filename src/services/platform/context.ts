/**
 * Per-process platform context: configuration, client and logger, built once
 * at an entry point and passed down explicitly.
 */

import { PlatformClient } from './client.js';
import { loadPlatformConfig, type PlatformConfig, type PlatformConfigInput } from './config.js';
import { createLogger, type Logger } from '../../utils/logger.js';

export interface PlatformContext {
  config: PlatformConfig;
  client: PlatformClient;
  log: Logger;
}

export interface ContextOptions {
  overrides?: Partial<PlatformConfigInput>;
  verbose?: boolean;
  /** Component tag for log lines */
  tag?: string;
}

export function createPlatformContext(options: ContextOptions = {}): PlatformContext {
  const config = loadPlatformConfig(options.overrides);
  const log = createLogger(options.tag ?? 'docintel', options.verbose ?? false);
  const client = new PlatformClient(config, log);
  return { config, client, log };
}
