import { z } from 'zod';

/** Text extracted from a document, produced only when the index has to be built. */
export interface ExtractedText {
  text: string;
  pageCount: number;
}

/**
 * A document to index. `bytes` is what gets fingerprinted; text extraction is deferred
 * so that a cache hit never pays for parsing.
 */
export interface SourceDocument {
  /** Identifier for logs and results (e.g. the file path). */
  id: string;
  bytes: Uint8Array;
  extractText(): Promise<ExtractedText>;
}

/** Lowercase hex SHA-256 of the document bytes. */
export type Fingerprint = string;

/**
 * A contiguous window of the extracted text. `start` and `end` are offsets into that text,
 * so consecutive segments overlap by `previous.end - next.start` characters.
 */
export interface Segment {
  index: number;
  text: string;
  start: number;
  end: number;
}

export type EmbeddingVector = number[];

export const SegmentSchema = z.object({
  index: z.number().int().nonnegative(),
  text: z.string(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
});

export const IndexStateSchema = z.object({
  version: z.literal(1),
  metric: z.literal('cosine'),
  dimension: z.number().int().nonnegative(),
  size: z.number().int().nonnegative(),
  norms: z.array(z.number()),
});

/** Serialized state of a vector index. */
export type IndexState = z.infer<typeof IndexStateSchema>;

export interface CacheEntry {
  fingerprint: Fingerprint;
  segments: Segment[];
  vectors: EmbeddingVector[];
  indexState: IndexState;
  /** ISO timestamp of when the entry was built. */
  createdAt: string;
  /** Where the document came from, if known. */
  source?: string;
}

/** Builds a document from text already in memory. The bytes are the UTF-8 encoding of the text. */
export function textDocument(id: string, text: string, pageCount = 1): SourceDocument {
  return {
    id,
    bytes: new TextEncoder().encode(text),
    extractText: async () => ({ text, pageCount }),
  };
}
