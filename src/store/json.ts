/**
 * JSON read helpers, canonical serialization, and checksums.
 * This is the primary data access layer for task-ledger data files.
 */

import { createHash } from 'node:crypto';
import { appendToFile, safeReadFile } from './atomic.js';
import { ValidationError } from '../core/errors.js';

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist. The parsed value is returned
 * unvalidated; callers narrow it with a schema.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  try {
    return JSON.parse(content);
  } catch (err) {
    throw new ValidationError(`Invalid JSON in: ${filePath}`, { cause: err });
  }
}

/**
 * Serialize a value to JSON with object keys sorted at every depth and no
 * whitespace. The output depends only on content, never on the order in
 * which keys were inserted.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const members = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${members.join(',')}}`;
  }
  // undefined, functions and symbols have no JSON form; arrays render them as null
  return JSON.stringify(value) ?? 'null';
}

/**
 * Compute the SHA-256 checksum of a document, covering every top-level
 * field except `checksum` itself. Returns 64 lowercase hex characters.
 */
export function computeChecksum(document: object): string {
  const content = Object.fromEntries(
    Object.entries(document).filter(([key]) => key !== 'checksum'),
  );
  return createHash('sha256').update(canonicalJson(content)).digest('hex');
}

/**
 * Check a document against its embedded checksum.
 * False when the checksum is missing, not a string, or does not match.
 */
export function verifyChecksum(document: object): boolean {
  if (!('checksum' in document) || typeof document.checksum !== 'string') {
    return false;
  }
  return document.checksum === computeChecksum(document);
}

/**
 * Append one entry as a line to a JSONL file.
 * Used for the audit log.
 */
export async function appendJsonl(filePath: string, entry: unknown): Promise<void> {
  await appendToFile(filePath, JSON.stringify(entry) + '\n');
}
