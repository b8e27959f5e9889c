/**
 * File System Utilities
 *
 * Small async helpers around fs/promises used by the manifest loader, the
 * document cache and the upload path.
 */

import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * MIME type mapping for the document types the platform ingests
 */
const MIME_TYPE_MAP: Record<string, string> = {
  pdf: 'application/pdf',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  tif: 'image/tiff',
  tiff: 'image/tiff',
  gif: 'image/gif',
  webp: 'image/webp',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  csv: 'text/csv',
  txt: 'text/plain',
};

/**
 * Get file extension (normalized, lowercase, without dot)
 */
export function getFileExtension(filePath: string): string {
  const ext = path.extname(filePath).toLowerCase();
  return ext.startsWith('.') ? ext.slice(1) : ext;
}

/**
 * Get MIME type for a file path or extension
 *
 * @returns MIME type string or 'application/octet-stream' if unknown
 */
export function getMimeType(fileOrExtension: string): string {
  const ext = fileOrExtension.includes('.') ? getFileExtension(fileOrExtension) : fileOrExtension;
  return MIME_TYPE_MAP[ext.toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Check if a path exists and is a file
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Read and JSON-parse a file. The result is unvalidated; callers run it
 * through a zod schema.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const text = await fs.readFile(filePath, { encoding: 'utf-8' });
  return JSON.parse(text) as unknown;
}

/**
 * Write a value as pretty-printed JSON, creating the parent directory.
 */
export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fs.writeFile(filePath, JSON.stringify(value, null, 2) + '\n', { encoding: 'utf-8' });
}

/**
 * Read file contents as a buffer
 */
export async function readFileBuffer(filePath: string): Promise<Buffer> {
  return fs.readFile(filePath);
}
