/**
 * Field MCP Tools
 *
 * Tools: docintel_copy_fields
 *
 * @module tools/fields
 */

import { formatResponse, handleError, type ContextProvider, type ToolDefinition, type ToolResponse } from './shared.js';
import { successResult } from '../server/types.js';
import { validateInput, CopyFieldsInput } from '../utils/validation.js';
import { copyFields } from '../services/labeling/fields.js';

export function createFieldTools(getContext: ContextProvider): Record<string, ToolDefinition> {
  async function handleCopyFields(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(CopyFieldsInput, params);
      const { client, log } = getContext();

      const result = await copyFields(client, input.source_collection_name, input.destination_collection_name, log);

      return formatResponse(
        successResult({
          collection_id: result.collectionId,
          collection_url: result.collectionUrl,
          fields: result.fields,
        })
      );
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    docintel_copy_fields: {
      description: "Create a new collection with the source collection's inferred fields",
      inputSchema: CopyFieldsInput.shape,
      handler: handleCopyFields,
    },
  };
}
