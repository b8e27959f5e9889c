/**
 * Query builders
 *
 * Every query string the engine and tools send. Keeping them here means the
 * tests can assert on exactly what goes over the wire.
 *
 * @module services/platform/iql
 */

export function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function quoteList(values: readonly string[]): string {
  return values.map(quote).join(', ');
}

export function collectionRef(collectionId: string): string {
  return `@\`file_collections::${collectionId}\``;
}

// ═══════════════════════════════════════════════════════════════════════════════
// COLLECTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function collectionIdByName(name: string): string {
  return `@__system::collections[uid] Name=${quote(name)}`;
}

export function fileCollectionsByName(name: string): string {
  return `@file_collections name=${quote(name)}`;
}

export function collectionIds(nameFilter?: string): string {
  return nameFilter ? `@file_collections[uid] name:${quote(nameFilter)}` : '@file_collections[uid]';
}

export function collectionSchema(collectionId: string): string {
  return `${collectionRef(collectionId)} limit:0`;
}

export function entityClassSchema(entityClass: string): string {
  return `@\`${entityClass}\` limit:0`;
}

export function collectionRows(collectionId: string): string {
  return collectionRef(collectionId);
}

export function collectionFileUids(collectionId: string, filter?: string): string {
  return filter ? `${collectionRef(collectionId)}[uid] ${filter}` : `${collectionRef(collectionId)}[uid]`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Projection for a file's OCR payload. Collections labeled only with document
 * tags skip downloading text.
 */
export function documentProjection(skipText: boolean): string {
  return skipText
    ? '[uid, name: File.name, text: {words: build_array()}, entities: build_array()]'
    : '[uid, name: File.name, text: File.text, entities: File.ner.entities]';
}

export function collectionDocuments(collectionId: string, skipText: boolean): string {
  return `${collectionRef(collectionId)}${documentProjection(skipText)}`;
}

export function collectionDocumentsByName(collectionId: string, names: readonly string[], skipText: boolean): string {
  return `${collectionDocuments(collectionId, skipText)} in(File.name, ${quoteList(names)})`;
}

export function preprocessedDocumentsByName(
  collectionId: string,
  names: readonly string[],
  skipText: boolean
): string {
  return `${collectionDocumentsByName(collectionId, names, skipText)} File.IsPreprocessed=true`;
}

export function preprocessedDocumentsByUid(collectionId: string, uids: readonly string[], skipText: boolean): string {
  return `${collectionDocuments(collectionId, skipText)} in(uid, ${quoteList(uids)}) File.IsPreprocessed=true`;
}

export function orgFilesByName(names: readonly string[]): string {
  return `@files[name: File.name, uid] in(File.name, ${quoteList(names)})`;
}

export function processedResults(collectionId: string, uids: readonly string[]): string {
  const uidFilter = uids.length > 0 ? ` and in(uid, ${quoteList(uids)})` : '';
  return `${collectionRef(collectionId)} File.IsPreprocessed=true and __system.IsProcessed=true${uidFilter} [.: __resolve(.)]`;
}

export function splitResults(uploadUids: readonly string[]): string {
  return (
    '@`files`[uid, upload_uid: File.upload_uid, child: -eq(uid, File.upload_uid)] ' +
    `in(File.upload_uid, ${quoteList(uploadUids)}) and child=true`
  );
}

export function orgFilesWithDownloadUrls(): string {
  return '@files[uid, File: File[download_url, name]] -`File type`=Data';
}

export function collectionMembership(): string {
  return '@file_collection_contents[collection_uid, files: array_agg(file_uid)] -collection=null';
}

export function collectionNames(): string {
  return '@file_collection_contents[collection_uid, name: collection.name] -collection=null';
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODEL VERSIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function modelVersions(collectionId: string): string {
  return (
    `@__system::ecs name='file_collections::${collectionId}' ` +
    '[.: flatten(fields[field, infer_func])] ' +
    '[field_name: field.name, model_version: join_one(__training_membership, infer_func.model_name, model_name).model_version] ' +
    '-model_version=null'
  );
}

/**
 * Sum, over the given fields, of how far each row's model version must move
 * before it reflects the labels about to be written
 */
export function expectedIncrement(
  collectionId: string,
  fieldNames: readonly string[],
  versions: Readonly<Record<string, number>>
): string {
  const terms = fieldNames.map(
    (name) =>
      `(SUM(IF(\`${name}\`.Label.IsPrediction or \`${name}\`=null, 1, ${versions[name] ?? 0}-\`${name}\`.ModelVersion)))`
  );
  return `${collectionRef(collectionId)}[increment: ${['0', ...terms].join(' + ')}]`;
}

export function modelVersionSum(collectionId: string, fieldNames: readonly string[]): string {
  const terms = fieldNames.map((name) => `SUM(\`${name}\`.\`ModelVersion\`)`);
  return `${collectionRef(collectionId)}[sum_mv: ${['0', ...terms].join(' + ')}]`;
}

export function ping(): string {
  return '@files limit:0';
}
