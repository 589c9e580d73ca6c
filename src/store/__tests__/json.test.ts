/**
 * Tests for JSON reads, canonical serialization and checksums.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { readJson, canonicalJson, computeChecksum, verifyChecksum, appendJsonl } from '../json.js';
import { ValidationError } from '../../core/errors.js';

/** SHA-256 of `{"records":[]}`. */
const EMPTY_COLLECTION_CHECKSUM = '1b8b4c0b6f6ad1d32565952720bc004eeb1f188f62045e4d5525ae2af8c78432';

describe('canonicalJson', () => {
  it('sorts keys at every depth and drops whitespace', () => {
    const value = { b: 1, a: { d: [1, { z: 1, y: 2 }], c: null } };
    expect(canonicalJson(value)).toBe('{"a":{"c":null,"d":[1,{"y":2,"z":1}]},"b":1}');
  });

  it('does not depend on key insertion order', () => {
    expect(canonicalJson({ title: 'x', id: '1' })).toBe(canonicalJson({ id: '1', title: 'x' }));
  });

  it('escapes strings the way JSON.stringify does', () => {
    expect(canonicalJson({ s: 'line\n"quoted"' })).toBe('{"s":"line\\n\\"quoted\\""}');
  });
});

describe('computeChecksum', () => {
  it('hashes the canonical form with SHA-256', () => {
    expect(computeChecksum({ records: [] })).toBe(EMPTY_COLLECTION_CHECKSUM);
  });

  it('excludes the checksum field itself', () => {
    expect(computeChecksum({ records: [], checksum: 'anything' })).toBe(EMPTY_COLLECTION_CHECKSUM);
  });

  it('is independent of key order inside records', () => {
    const a = computeChecksum({ records: [{ id: '1', title: 'x' }] });
    const b = computeChecksum({ records: [{ title: 'x', id: '1' }] });
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{64}$/);
  });

  it('changes when any content changes', () => {
    expect(computeChecksum({ records: [{ id: '1' }] })).not.toBe(computeChecksum({ records: [{ id: '2' }] }));
  });
});

describe('verifyChecksum', () => {
  it('accepts a document carrying its own checksum', () => {
    const records = [{ id: '1', title: 'x' }];
    expect(verifyChecksum({ records, checksum: computeChecksum({ records }) })).toBe(true);
  });

  it('rejects a missing or non-string checksum', () => {
    expect(verifyChecksum({ records: [] })).toBe(false);
    expect(verifyChecksum({ records: [], checksum: 42 })).toBe(false);
  });

  it('rejects content that no longer matches', () => {
    const checksum = computeChecksum({ records: [{ id: '1', title: 'x' }] });
    expect(verifyChecksum({ records: [{ id: '1', title: 'y' }], checksum })).toBe(false);
  });
});

describe('file helpers', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'task-ledger-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('readJson parses valid JSON', async () => {
    const filePath = join(tempDir, 'data.json');
    await writeFile(filePath, '{"key": "value"}');
    expect(await readJson(filePath)).toEqual({ key: 'value' });
  });

  it('readJson returns null for missing files', async () => {
    expect(await readJson(join(tempDir, 'missing.json'))).toBeNull();
  });

  it('readJson throws ValidationError on invalid JSON', async () => {
    const filePath = join(tempDir, 'bad.json');
    await writeFile(filePath, '{invalid}');
    await expect(readJson(filePath)).rejects.toThrow(ValidationError);
    await expect(readJson(filePath)).rejects.toThrow(`Invalid JSON in: ${filePath}`);
  });

  it('appendJsonl writes one line per entry', async () => {
    const filePath = join(tempDir, 'audit.log');
    await appendJsonl(filePath, { n: 1 });
    await appendJsonl(filePath, { n: 2 });
    expect(await readFile(filePath, 'utf8')).toBe('{"n":1}\n{"n":2}\n');
  });
});
