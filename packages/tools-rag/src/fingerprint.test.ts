import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DocumentReadError } from './errors.js';
import { fingerprint, fingerprintFile, isFingerprint } from './fingerprint.js';

const EMPTY_SHA256 = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';
const ABC_SHA256 = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';

describe('fingerprint', () => {
  it('should hash strings and bytes alike', () => {
    expect(fingerprint('abc')).toBe(ABC_SHA256);
    expect(fingerprint(new TextEncoder().encode('abc'))).toBe(ABC_SHA256);
  });

  it('should hash empty content', () => {
    expect(fingerprint(new Uint8Array())).toBe(EMPTY_SHA256);
  });

  it('should distinguish the empty document from non-empty ones', () => {
    expect(fingerprint('')).not.toBe(fingerprint('\0'));
    expect(fingerprint('')).not.toBe(fingerprint(' '));
  });

  it('should not collide over a sample of similar documents', () => {
    const documents = new Set<string>();
    for (let i = 0; i < 2000; i++) documents.add(`document ${i}`);
    documents.add('ab');
    documents.add('ba');
    documents.add('a\nb');
    const fingerprints = new Set([...documents].map((document) => fingerprint(document)));
    expect(fingerprints.size).toBe(documents.size);
  });

  it('should change when a single byte changes', () => {
    expect(fingerprint('abd')).not.toBe(fingerprint('abc'));
  });
});

describe('isFingerprint', () => {
  it('should accept lowercase 64-digit hex only', () => {
    expect(isFingerprint(ABC_SHA256)).toBe(true);
    expect(isFingerprint(ABC_SHA256.toUpperCase())).toBe(false);
    expect(isFingerprint(ABC_SHA256.slice(1))).toBe(false);
    expect(isFingerprint('../escape')).toBe(false);
  });
});

describe('fingerprintFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'paperqa-fp-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should match the in-memory fingerprint', async () => {
    const file = path.join(dir, 'doc.pdf');
    await writeFile(file, 'abc');
    await expect(fingerprintFile(file)).resolves.toBe(ABC_SHA256);
  });

  it('should fail with DocumentReadError for a missing file', async () => {
    await expect(fingerprintFile(path.join(dir, 'missing.pdf'))).rejects.toBeInstanceOf(DocumentReadError);
  });
});
