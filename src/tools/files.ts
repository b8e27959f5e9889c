/**
 * File MCP Tools
 *
 * Tools: docintel_upload_files, docintel_poll_results
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/files
 */

import { formatResponse, handleError, type ContextProvider, type ToolDefinition, type ToolResponse } from './shared.js';
import { successResult } from '../server/types.js';
import { validateInput, UploadFilesInput, PollResultsInput } from '../utils/validation.js';
import { collectUploadResult, type UploadFile } from '../services/platform/transport.js';
import type { PlatformClient } from '../services/platform/client.js';
import { validationError } from '../server/errors.js';

async function collectResults(client: PlatformClient, collectionId: string, uids: string[]): Promise<unknown[]> {
  const rows: unknown[] = [];
  for await (const row of client.pollForResults(collectionId, uids)) {
    rows.push(row);
  }
  return rows;
}

export function createFileTools(getContext: ContextProvider): Record<string, ToolDefinition> {
  // ═════════════════════════════════════════════════════════════════════════════
  // docintel_upload_files
  // ═════════════════════════════════════════════════════════════════════════════

  async function handleUploadFiles(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(UploadFilesInput, params);
      if (input.wait && input.collection_id === undefined) {
        throw validationError('wait requires collection_id');
      }
      const { client } = getContext();

      const files: UploadFile[] = input.files.map((f) => ({ name: f.name, path: f.path, uid: f.uid }));
      const uids = await collectUploadResult(await client.uploadFiles(input.collection_id ?? null, files));

      const results =
        input.wait && input.collection_id !== undefined
          ? await collectResults(client, input.collection_id, uids)
          : undefined;

      return formatResponse(
        successResult({
          uids,
          uploaded: uids.length,
          ...(results !== undefined && { results }),
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  // ═════════════════════════════════════════════════════════════════════════════
  // docintel_poll_results
  // ═════════════════════════════════════════════════════════════════════════════

  async function handlePollResults(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(PollResultsInput, params);
      const { client } = getContext();

      const results = await collectResults(client, input.collection_id, input.uids);

      return formatResponse(successResult({ results, count: results.length }));
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    docintel_upload_files: {
      description:
        'Upload local files or URLs, optionally into a collection. With wait=true, returns the processed rows.',
      inputSchema: UploadFilesInput.shape,
      handler: handleUploadFiles,
    },
    docintel_poll_results: {
      description: 'Wait until the given files are processed in a collection and return their rows',
      inputSchema: PollResultsInput.shape,
      handler: handlePollResults,
    },
  };
}
