/**
 * Filesystem cache of retrieved documents, one JSON file per source file
 * name. An entry either holds the document or records that the collection
 * did not have it. Entries are only written after an authoritative lookup.
 *
 * @module services/labeling/document-cache
 */

import * as path from 'path';
import { z } from 'zod';
import { RetrievedDocumentSchema, type RetrievedDocument } from '../../models/wire.js';
import { ensureDirectory, fileExists, readJsonFile, writeJsonFile } from '../../utils/files.js';
import { safeValidateInput } from '../../utils/validation.js';
import { cacheError } from '../../server/errors.js';

export type CacheEntry = { status: 'found'; document: RetrievedDocument } | { status: 'missing' };

const CacheEntrySchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('found'), document: RetrievedDocumentSchema }),
  z.object({ status: z.literal('missing') }),
]);

export class DocumentCache {
  constructor(readonly dir: string) {}

  pathFor(fileName: string): string {
    return path.join(this.dir, `${encodeURIComponent(fileName)}.json`);
  }

  /**
   * @returns the entry, or null when the file name was never cached
   * @throws SyncError CACHE_ERROR when an entry exists but cannot be read
   */
  async read(fileName: string): Promise<CacheEntry | null> {
    const entryPath = this.pathFor(fileName);
    if (!(await fileExists(entryPath))) {
      return null;
    }

    let raw: unknown;
    try {
      raw = await readJsonFile(entryPath);
    } catch (error) {
      throw cacheError(entryPath, error instanceof Error ? error.message : String(error));
    }

    const parsed = safeValidateInput(CacheEntrySchema, raw);
    if (!parsed.success) {
      throw cacheError(entryPath, parsed.error.message);
    }
    return parsed.data;
  }

  async writeFound(fileName: string, document: RetrievedDocument): Promise<void> {
    await this.write(fileName, { status: 'found', document });
  }

  async writeMissing(fileName: string): Promise<void> {
    await this.write(fileName, { status: 'missing' });
  }

  private async write(fileName: string, entry: CacheEntry): Promise<void> {
    await ensureDirectory(this.dir);
    await writeJsonFile(this.pathFor(fileName), entry);
  }
}
