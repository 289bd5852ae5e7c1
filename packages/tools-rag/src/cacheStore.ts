import { createHash, randomUUID } from 'node:crypto';
import { access, mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createLogger } from '@paperqa/tools-core';
import { z } from 'zod';
import { CacheReadError, CacheWriteError, errorMessage } from './errors.js';
import { isFingerprint } from './fingerprint.js';
import { type CacheEntry, type Fingerprint, IndexStateSchema, SegmentSchema } from './types.js';

const log = createLogger('cache');

/**
 * Durable map from document fingerprint to its embedded segments.
 * Entries are immutable once published: saving a fingerprint that is already stored is a no-op.
 */
export interface CacheStore {
  /** Returns the entry, or null when it is absent or cannot be trusted. */
  lookup(fingerprint: Fingerprint): Promise<CacheEntry | null>;
  /**
   * Publishes an entry atomically. Fails with CacheWriteError on storage faults, or when the
   * signal aborts before the entry is published.
   */
  save(entry: CacheEntry, options?: SaveOptions): Promise<void>;
  /** Removes an entry. Removing an absent entry is not an error. */
  invalidate(fingerprint: Fingerprint): Promise<void>;
  list(): Promise<Fingerprint[]>;
}

export interface SaveOptions {
  signal?: AbortSignal;
}

export const CACHE_FORMAT_VERSION = 1;
export const STAGING_PREFIX = '.staging-';

const SEGMENTS_FILE = 'segments.json';
const VECTORS_FILE = 'vectors.json';
const INDEX_FILE = 'index.json';
const MANIFEST_FILE = 'manifest.json';

const ManifestSchema = z.object({
  formatVersion: z.literal(CACHE_FORMAT_VERSION),
  fingerprint: z.string(),
  createdAt: z.string(),
  source: z.string().optional(),
  segmentCount: z.number().int().nonnegative(),
  dimension: z.number().int().nonnegative(),
  /** SHA-256 of each payload file. */
  checksums: z.object({
    segments: z.string(),
    vectors: z.string(),
    index: z.string(),
  }),
});
type Manifest = z.infer<typeof ManifestSchema>;

const SegmentsFileSchema = z.array(SegmentSchema);
const VectorsFileSchema = z.array(z.array(z.number()));

function sha256(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && codes.includes(error.code);
}

async function exists(target: string): Promise<boolean> {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * One directory per fingerprint under `rootDir`:
 *
 *   <root>/<fingerprint>/segments.json
 *   <root>/<fingerprint>/vectors.json
 *   <root>/<fingerprint>/index.json
 *   <root>/<fingerprint>/manifest.json   (written last, checksums of the other three)
 *
 * Entries are assembled in `<root>/.staging-<fingerprint>-<nonce>/` and published with a single
 * directory rename, so readers see either nothing or a complete entry.
 */
export class FsCacheStore implements CacheStore {
  private constructor(public readonly rootDir: string) {}

  /** Creates the root directory if needed and removes staging directories left by interrupted writes. */
  public static async open(rootDir: string): Promise<FsCacheStore> {
    const resolved = path.resolve(rootDir);
    try {
      await mkdir(resolved, { recursive: true });
      const names = await readdir(resolved);
      for (const name of names.filter((n) => n.startsWith(STAGING_PREFIX))) {
        log.info(`Removing abandoned staging directory ${name}`);
        await rm(path.join(resolved, name), { recursive: true, force: true });
      }
    } catch (e: unknown) {
      throw new CacheWriteError(`Cannot open cache directory '${resolved}': ${errorMessage(e)}`, { path: resolved }, { cause: e });
    }
    return new FsCacheStore(resolved);
  }

  public entryDir(fingerprint: Fingerprint): string {
    return path.join(this.rootDir, fingerprint);
  }

  public async lookup(fingerprint: Fingerprint): Promise<CacheEntry | null> {
    if (!isFingerprint(fingerprint)) return null;
    const dir = this.entryDir(fingerprint);

    let manifestText: string;
    try {
      manifestText = await readFile(path.join(dir, MANIFEST_FILE), 'utf8');
    } catch (e: unknown) {
      if (hasErrorCode(e, 'ENOENT', 'ENOTDIR') && (await exists(dir))) {
        this.reportUnreadable(fingerprint, 'entry has no manifest (incomplete write)');
      } else if (!hasErrorCode(e, 'ENOENT', 'ENOTDIR')) {
        this.reportUnreadable(fingerprint, errorMessage(e), e);
      }
      return null;
    }

    try {
      const manifest = ManifestSchema.parse(JSON.parse(manifestText));
      if (manifest.fingerprint !== fingerprint) {
        this.reportUnreadable(fingerprint, `manifest belongs to ${manifest.fingerprint}`);
        return null;
      }
      const [segmentsText, vectorsText, indexText] = await Promise.all(
        [SEGMENTS_FILE, VECTORS_FILE, INDEX_FILE].map((file) => readFile(path.join(dir, file), 'utf8')),
      );
      if (
        sha256(segmentsText) !== manifest.checksums.segments ||
        sha256(vectorsText) !== manifest.checksums.vectors ||
        sha256(indexText) !== manifest.checksums.index
      ) {
        this.reportUnreadable(fingerprint, 'checksum mismatch');
        return null;
      }
      const segments = SegmentsFileSchema.parse(JSON.parse(segmentsText));
      const vectors = VectorsFileSchema.parse(JSON.parse(vectorsText));
      const indexState = IndexStateSchema.parse(JSON.parse(indexText));
      if (segments.length !== manifest.segmentCount || vectors.length !== manifest.segmentCount) {
        this.reportUnreadable(fingerprint, 'segment and vector counts disagree with the manifest');
        return null;
      }
      return {
        fingerprint,
        segments,
        vectors,
        indexState,
        createdAt: manifest.createdAt,
        source: manifest.source,
      };
    } catch (e: unknown) {
      this.reportUnreadable(fingerprint, errorMessage(e), e);
      return null;
    }
  }

  public async save(entry: CacheEntry, options: SaveOptions = {}): Promise<void> {
    const { fingerprint } = entry;
    if (!isFingerprint(fingerprint)) {
      throw new CacheWriteError(`Refusing to store entry under invalid fingerprint '${fingerprint}'`, { fingerprint });
    }
    assertNotCancelled(fingerprint, options.signal);
    const target = this.entryDir(fingerprint);
    if (await exists(target)) {
      if (await this.lookup(fingerprint)) {
        log.debug(`Entry ${fingerprint} already published`);
        return;
      }
      // Unreadable leftovers block the rename.
      await this.removeDir(target, fingerprint);
    }

    const staging = path.join(this.rootDir, `${STAGING_PREFIX}${fingerprint}-${randomUUID()}`);
    try {
      await mkdir(staging, { recursive: false });
      const segmentsText = JSON.stringify(entry.segments);
      const vectorsText = JSON.stringify(entry.vectors);
      const indexText = JSON.stringify(entry.indexState);
      await writeFile(path.join(staging, SEGMENTS_FILE), segmentsText, 'utf8');
      await writeFile(path.join(staging, VECTORS_FILE), vectorsText, 'utf8');
      await writeFile(path.join(staging, INDEX_FILE), indexText, 'utf8');
      const manifest: Manifest = {
        formatVersion: CACHE_FORMAT_VERSION,
        fingerprint,
        createdAt: entry.createdAt,
        source: entry.source,
        segmentCount: entry.segments.length,
        dimension: entry.indexState.dimension,
        checksums: {
          segments: sha256(segmentsText),
          vectors: sha256(vectorsText),
          index: sha256(indexText),
        },
      };
      await writeFile(path.join(staging, MANIFEST_FILE), JSON.stringify(manifest, null, 2), 'utf8');
    } catch (e: unknown) {
      await this.discardStaging(staging);
      throw new CacheWriteError(`Cannot write cache entry ${fingerprint}: ${errorMessage(e)}`, { fingerprint }, { cause: e });
    }

    if (options.signal?.aborted) {
      await this.discardStaging(staging);
      assertNotCancelled(fingerprint, options.signal);
    }

    try {
      await rename(staging, target);
      log.info(`Published cache entry ${fingerprint} (${entry.segments.length} segments)`);
    } catch (e: unknown) {
      await this.discardStaging(staging);
      if (hasErrorCode(e, 'EEXIST', 'ENOTEMPTY')) {
        log.debug(`Entry ${fingerprint} was published concurrently; discarding staged copy`);
        return;
      }
      throw new CacheWriteError(`Cannot publish cache entry ${fingerprint}: ${errorMessage(e)}`, { fingerprint }, { cause: e });
    }
  }

  public async invalidate(fingerprint: Fingerprint): Promise<void> {
    if (!isFingerprint(fingerprint)) return;
    await this.removeDir(this.entryDir(fingerprint), fingerprint);
  }

  public async list(): Promise<Fingerprint[]> {
    const names = await readdir(this.rootDir);
    const published: Fingerprint[] = [];
    for (const name of names.filter(isFingerprint).sort()) {
      if (await exists(path.join(this.rootDir, name, MANIFEST_FILE))) published.push(name);
    }
    return published;
  }

  private async removeDir(dir: string, fingerprint: Fingerprint): Promise<void> {
    try {
      await rm(dir, { recursive: true, force: true });
    } catch (e: unknown) {
      throw new CacheWriteError(`Cannot remove cache entry ${fingerprint}: ${errorMessage(e)}`, { fingerprint }, { cause: e });
    }
  }

  private async discardStaging(staging: string): Promise<void> {
    try {
      await rm(staging, { recursive: true, force: true });
    } catch (e: unknown) {
      // Swept by the next open().
      log.warn(`Cannot remove staging directory ${staging}: ${errorMessage(e)}`);
    }
  }

  private reportUnreadable(fingerprint: Fingerprint, reason: string, cause?: unknown): void {
    const error = new CacheReadError(`Ignoring cache entry ${fingerprint}: ${reason}`, { fingerprint }, { cause });
    log.warn(error.message);
  }
}

function assertNotCancelled(fingerprint: Fingerprint, signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CacheWriteError(`Cache entry ${fingerprint} not published: the build was cancelled`, { fingerprint }, { cause: signal.reason });
  }
}

/** Process-local store with the same contract. Entries are copied in and out. */
export class InMemoryCacheStore implements CacheStore {
  private readonly entries = new Map<Fingerprint, CacheEntry>();

  public async lookup(fingerprint: Fingerprint): Promise<CacheEntry | null> {
    const entry = this.entries.get(fingerprint);
    return entry ? structuredClone(entry) : null;
  }

  public async save(entry: CacheEntry, options: SaveOptions = {}): Promise<void> {
    assertNotCancelled(entry.fingerprint, options.signal);
    if (this.entries.has(entry.fingerprint)) return;
    this.entries.set(entry.fingerprint, structuredClone(entry));
  }

  public async invalidate(fingerprint: Fingerprint): Promise<void> {
    this.entries.delete(fingerprint);
  }

  public async list(): Promise<Fingerprint[]> {
    return [...this.entries.keys()].sort();
  }
}
