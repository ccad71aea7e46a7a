import { SCORING_METHOD } from '../constants.js';
import { clampUnit, cosineSimilarity, type Vector } from './similarity.js';
import type { ClassificationResult, ClassificationResultJson, EngineState } from './types.js';

/**
 * Raw cosine similarity of the question against every prototype, in
 * canonical category order.
 */
export function scorePrototypes(state: EngineState, question: Vector): number[] {
  return state.prototypes.map(prototype => cosineSimilarity(question, prototype.vector));
}

/**
 * Index of the highest score. Only a strictly greater score displaces the
 * current best, so ties go to the earliest category.
 */
export function selectBest(scores: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < scores.length; i++) {
    if (scores[i] > scores[best]) {
      best = i;
    }
  }
  return best;
}

export function buildResult(
  state: EngineState,
  scores: readonly number[],
  highSimilarityThreshold: number
): ClassificationResult {
  const best = selectBest(scores);
  const winner = state.categories[best];
  const confidence = clampUnit(scores[best]);

  const similarities = new Map(state.categories.map((category, i): [string, number] => [category.id, scores[i]]));

  return {
    categoryId: winner.id,
    displayName: winner.displayName,
    confidence,
    method: SCORING_METHOD,
    similarities,
    isHighSimilarity: confidence >= highSimilarityThreshold,
  };
}

/**
 * Convert a result for JSON output. Object.fromEntries defines own data
 * properties, so ids such as `__proto__` survive.
 */
export function serializeResult(result: ClassificationResult): ClassificationResultJson {
  return { ...result, similarities: Object.fromEntries(result.similarities) };
}
