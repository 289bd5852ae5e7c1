import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { DocumentReadError, errorMessage } from './errors.js';
import type { Fingerprint } from './types.js';

const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/;

/** SHA-256 over every byte of the document, hex encoded. */
export function fingerprint(content: Uint8Array | string): Fingerprint {
  return createHash('sha256').update(content).digest('hex');
}

export function isFingerprint(value: string): value is Fingerprint {
  return FINGERPRINT_PATTERN.test(value);
}

/** Streams a file through the same hash as {@link fingerprint}. */
export async function fingerprintFile(filePath: string): Promise<Fingerprint> {
  const hash = createHash('sha256');
  try {
    for await (const chunk of createReadStream(filePath)) {
      hash.update(chunk);
    }
  } catch (e: unknown) {
    throw new DocumentReadError(`Cannot read '${filePath}': ${errorMessage(e)}`, { path: filePath }, { cause: e });
  }
  return hash.digest('hex');
}
