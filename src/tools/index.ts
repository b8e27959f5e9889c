/**
 * MCP Tool Module Exports
 *
 * @module tools
 */

import type { ContextProvider, ToolDefinition } from './shared.js';
import { createQueryTools } from './query.js';
import { createFileTools } from './files.js';
import { createSyncTools } from './sync.js';
import { createFieldTools } from './fields.js';

export * from './shared.js';
export { createQueryTools } from './query.js';
export { createFileTools } from './files.js';
export { createSyncTools } from './sync.js';
export { createFieldTools } from './fields.js';

/**
 * Every tool the server registers, keyed by tool name
 */
export function createAllTools(getContext: ContextProvider): Record<string, ToolDefinition> {
  return {
    ...createQueryTools(getContext),
    ...createFileTools(getContext),
    ...createSyncTools(getContext),
    ...createFieldTools(getContext),
  };
}
