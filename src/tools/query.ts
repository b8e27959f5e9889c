/**
 * Query MCP Tools
 *
 * Tools: docintel_query, docintel_collection_fields
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/query
 */

import { formatResponse, handleError, type ContextProvider, type ToolDefinition, type ToolResponse } from './shared.js';
import { successResult } from '../server/types.js';
import { validateInput, QueryInput, CollectionFieldsInput } from '../utils/validation.js';
import { fetchCurrentFields } from '../services/labeling/schema-reconciler.js';
import { serializeDocSchema } from '../models/schema.js';

export function createQueryTools(getContext: ContextProvider): Record<string, ToolDefinition> {
  // ═════════════════════════════════════════════════════════════════════════════
  // docintel_query
  // ═════════════════════════════════════════════════════════════════════════════

  async function handleQuery(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(QueryInput, params);
      const { client } = getContext();

      const response = await client.query(input.query, {
        mode: input.mode,
        cursor: input.cursor,
        timeout: input.timeout,
      });

      return formatResponse(
        successResult({
          data: response.data,
          count: response.data.length,
          cursor: response.cursor ?? null,
          schema: response.schema ?? null,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  // ═════════════════════════════════════════════════════════════════════════════
  // docintel_collection_fields
  // ═════════════════════════════════════════════════════════════════════════════

  async function handleCollectionFields(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(CollectionFieldsInput, params);
      const { client } = getContext();

      const docSchema = await fetchCurrentFields(client, input.collection_id);

      return formatResponse(
        successResult({
          collection_id: input.collection_id,
          doc_schema: serializeDocSchema(docSchema),
          field_count: Object.keys(docSchema.fields).length,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    docintel_query: {
      description: 'Run a query against the platform. mode=poll long-polls for changes since the cursor.',
      inputSchema: QueryInput.shape,
      handler: handleQuery,
    },
    docintel_collection_fields: {
      description: "Read a collection's inferred fields as a manifest doc_schema",
      inputSchema: CollectionFieldsInput.shape,
      handler: handleCollectionFields,
    },
  };
}
