/**
 * Copy the inferred fields of one collection into a new collection
 *
 * @module services/labeling/fields
 */

import { z } from 'zod';
import type { PlatformTransport, SchemaNode } from '../platform/transport.js';
import * as iql from '../platform/iql.js';
import {
  createFieldsInBatches,
  fieldsToDocSchema,
  filterInferredFields,
  generateSchema,
  parseFieldComment,
  type SchemaField,
} from './schema-reconciler.js';
import { buildFieldSpec } from '../../models/field-types.js';
import { validateInput } from '../../utils/validation.js';
import type { Logger } from '../../utils/logger.js';
import { collectionNotFoundError, validationError } from '../../server/errors.js';

const SYSTEM_FIELDS = new Set(['File', '__system', 'uid']);

const CollectionRowSchema = z.object({ field_ec: z.string() }).passthrough();

export interface CopyFieldsResult {
  collectionId: string;
  collectionUrl: string;
  fields: SchemaField[];
}

/**
 * Fields a collection defines itself, as opposed to ones inherited from the
 * file entity class
 */
export function ownFields(nodes: readonly SchemaNode[], entityClass: string): SchemaNode[] {
  return nodes.filter((n) => !SYSTEM_FIELDS.has(n.name) && parseFieldComment(n)?.entity_class === entityClass);
}

/**
 * @throws SyncError COLLECTION_NOT_FOUND when the source is missing
 * @throws SyncError VALIDATION_ERROR when the source name is ambiguous or
 * the destination already exists
 */
export async function copyFields(
  transport: PlatformTransport,
  srcName: string,
  dstName: string,
  log: Logger
): Promise<CopyFieldsResult> {
  const sources = (await transport.query(iql.fileCollectionsByName(srcName))).data;
  if (sources.length === 0) {
    throw collectionNotFoundError(srcName);
  }
  if (sources.length > 1) {
    throw validationError(`Multiple collections named '${srcName}'`, { name: srcName, count: sources.length });
  }
  const entityClass = validateInput(CollectionRowSchema, sources[0]).field_ec;

  const existing = (await transport.query(iql.fileCollectionsByName(dstName))).data;
  if (existing.length > 0) {
    throw validationError(`Destination collection '${dstName}' already exists. Please pick a different name`, {
      name: dstName,
    });
  }

  const response = await transport.query(iql.entityClassSchema(entityClass));
  const nodes = ownFields(response.schema?.children ?? [], entityClass);
  const fields = generateSchema(fieldsToDocSchema(filterInferredFields(nodes)));
  const specs = fields.map((f) => buildFieldSpec(f.fieldType, f.name, f.path));

  log.info(`Creating collection '${dstName}'...`);
  const collectionId = await transport.createCollection(dstName);
  const collectionUrl = transport.getAppUrl('fc', collectionId);
  log.info(`You can visit the new collection (${dstName}) at: ${collectionUrl}`);

  log.info(`Creating ${specs.length} fields...`);
  await createFieldsInBatches(transport, collectionId, specs);

  return { collectionId, collectionUrl, fields };
}
