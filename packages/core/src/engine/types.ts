import type { Category } from '../categories/types.js';
import type { Logger } from '../logger.js';

export type EngineStatus = 'uninitialized' | 'ready';

/** Scoring strategy that produced a result. Only embeddings exist today. */
export type ScoringMethod = 'embedding';

/**
 * Cached semantic center of one category: the centroid of its example
 * embeddings. Index-aligned with EngineState.categories.
 */
export interface PrototypeVector {
  readonly categoryId: string;
  readonly vector: readonly number[];
}

/**
 * Everything categorize() reads. Built once, frozen, and replaced as a
 * whole when the category set changes.
 */
export interface EngineState {
  readonly categories: readonly Category[];
  readonly prototypes: readonly PrototypeVector[];
  readonly dimension: number;
}

export interface ClassificationResult {
  categoryId: string;
  displayName: string;
  /** Winning similarity clamped into [0, 1] */
  confidence: number;
  method: ScoringMethod;
  /**
   * Raw similarity per category id. Iterates in canonical category order
   * whatever the ids look like.
   */
  similarities: ReadonlyMap<string, number>;
  isHighSimilarity: boolean;
}

/** JSON-ready form of a result, with similarities as a plain object */
export type ClassificationResultJson = Omit<ClassificationResult, 'similarities'> & {
  similarities: Record<string, number>;
};

export interface EngineOptions {
  logger?: Logger;
  /** Confidence at or above which isHighSimilarity is set (default 0.7) */
  highSimilarityThreshold?: number;
}
