import type { Category } from '../categories/types.js';
import type { EmbeddingService } from '../embeddings/types.js';
import { InitializationError, getErrorMessage } from '../errors/index.js';
import type { Logger } from '../logger.js';
import { centroid, isWellFormed } from './similarity.js';
import type { EngineState, PrototypeVector } from './types.js';

function validateCategories(categories: readonly Category[]): void {
  if (categories.length === 0) {
    throw new InitializationError('DuplicateCategoryId', 'At least one category is required');
  }

  const seen = new Set<string>();
  for (const category of categories) {
    if (seen.has(category.id)) {
      throw new InitializationError('DuplicateCategoryId', `Duplicate category id: ${category.id}`, {
        categoryId: category.id,
      });
    }
    seen.add(category.id);

    if (category.id.trim() === '') {
      throw new InitializationError('DuplicateCategoryId', `Invalid category id: "${category.id}"`, {
        categoryId: category.id,
      });
    }
    if (category.examples.length === 0) {
      throw new InitializationError('DuplicateCategoryId', `Category ${category.id} has no example phrases`, {
        categoryId: category.id,
      });
    }
  }
}

async function embedExamples(
  category: Category,
  embeddings: EmbeddingService
): Promise<Float32Array[]> {
  let vectors: Float32Array[];
  try {
    vectors = await embeddings.embedBatch([...category.examples]);
  } catch (error) {
    throw new InitializationError(
      'EmbeddingUnavailable',
      `Failed to embed examples for category ${category.id}: ${getErrorMessage(error)}`,
      { categoryId: category.id }
    );
  }

  if (vectors.length !== category.examples.length) {
    throw new InitializationError(
      'EmbeddingUnavailable',
      `Expected ${category.examples.length} embeddings for category ${category.id}, got ${vectors.length}`,
      { categoryId: category.id }
    );
  }
  return vectors;
}

/**
 * Embed every example phrase once and reduce each category to its centroid.
 * This is the only place category embeddings are computed.
 */
export async function buildEngineState(
  categories: readonly Category[],
  embeddings: EmbeddingService,
  logger: Logger
): Promise<EngineState> {
  validateCategories(categories);

  try {
    await embeddings.initialize();
  } catch (error) {
    throw new InitializationError(
      'EmbeddingUnavailable',
      `Embedding provider failed to initialize: ${getErrorMessage(error)}`
    );
  }

  let dimension = 0;
  const prototypes: PrototypeVector[] = [];

  for (const category of categories) {
    const vectors = await embedExamples(category, embeddings);

    if (dimension === 0) {
      dimension = vectors[0].length;
    }
    const malformed = vectors.findIndex(vector => dimension === 0 || !isWellFormed(vector, dimension));
    if (malformed !== -1) {
      throw new InitializationError(
        'EmbeddingUnavailable',
        `Embedding for example ${malformed} of category ${category.id} is malformed`,
        { categoryId: category.id, expectedDimension: dimension, actualDimension: vectors[malformed].length }
      );
    }

    prototypes.push(
      Object.freeze({
        categoryId: category.id,
        vector: Object.freeze(Array.from(centroid(vectors))),
      })
    );
    logger.debug(`Prototype for ${category.id} built from ${vectors.length} example(s)`);
  }

  logger.info(`Computed ${prototypes.length} category prototypes (dimension ${dimension})`);

  return Object.freeze({
    categories: Object.freeze(
      categories.map(category =>
        Object.freeze({
          id: category.id,
          displayName: category.displayName,
          examples: Object.freeze([...category.examples]),
        })
      )
    ),
    prototypes: Object.freeze(prototypes),
    dimension,
  });
}
