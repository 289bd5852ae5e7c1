import { EmbeddingShapeError } from './errors.js';
import type { CacheEntry, EmbeddingVector, IndexState, Segment } from './types.js';

export interface SearchHit {
  segment: Segment;
  score: number;
}

function norm(vector: readonly number[]): number {
  let sum = 0;
  for (const value of vector) sum += value * value;
  return Math.sqrt(sum);
}

/**
 * Exact cosine-similarity index over the vectors of one document.
 * Norms are precomputed and travel with the cache entry as the index state.
 */
export class VectorIndex {
  private constructor(
    public readonly segments: readonly Segment[],
    public readonly vectors: readonly EmbeddingVector[],
    public readonly dimension: number,
    private readonly norms: readonly number[],
  ) {}

  public static build(segments: readonly Segment[], vectors: readonly EmbeddingVector[]): VectorIndex {
    if (segments.length !== vectors.length) {
      throw new EmbeddingShapeError(
        `Cannot build index: ${segments.length} segments but ${vectors.length} vectors`,
      );
    }
    const dimension = vectors[0]?.length ?? 0;
    vectors.forEach((vector, index) => {
      if (vector.length !== dimension) {
        throw new EmbeddingShapeError(
          `Cannot build index: vector ${index} has dimension ${vector.length}, expected ${dimension}`,
        );
      }
    });
    return new VectorIndex(segments, vectors, dimension, vectors.map(norm));
  }

  /** Restores an index from a cache entry, recomputing norms if the stored state does not fit. */
  public static fromCacheEntry(entry: CacheEntry): VectorIndex {
    const { segments, vectors, indexState } = entry;
    const stateFits =
      indexState.size === vectors.length &&
      indexState.norms.length === vectors.length &&
      vectors.every((vector) => vector.length === indexState.dimension);
    if (!stateFits || segments.length !== vectors.length) {
      return VectorIndex.build(segments, vectors);
    }
    return new VectorIndex(segments, vectors, indexState.dimension, indexState.norms);
  }

  public get size(): number {
    return this.segments.length;
  }

  public toState(): IndexState {
    return {
      version: 1,
      metric: 'cosine',
      dimension: this.dimension,
      size: this.size,
      norms: [...this.norms],
    };
  }

  /**
   * Top-k segments by cosine similarity, highest first. Equal scores keep segment order.
   * Zero vectors score 0 against everything.
   */
  public query(vector: readonly number[], k: number): SearchHit[] {
    if (this.size > 0 && vector.length !== this.dimension) {
      throw new EmbeddingShapeError(
        `Query vector has dimension ${vector.length}, index expects ${this.dimension}`,
      );
    }
    if (k <= 0) return [];
    const queryNorm = norm(vector);
    const scored = this.vectors.map((candidate, position) => {
      const candidateNorm = this.norms[position] ?? 0;
      let dot = 0;
      for (let i = 0; i < candidate.length; i++) dot += (candidate[i] ?? 0) * (vector[i] ?? 0);
      const score = queryNorm === 0 || candidateNorm === 0 ? 0 : dot / (queryNorm * candidateNorm);
      return { position, score };
    });
    scored.sort((a, b) => b.score - a.score || a.position - b.position);
    return scored.slice(0, k).map(({ position, score }) => ({ segment: this.segments[position], score }));
  }
}
