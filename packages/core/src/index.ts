/**
 * @quecat/core - semantic question categorization
 *
 * This is the public API for:
 * - @quecat/app (HTTP service)
 * - @quecat/cli (command line)
 * - Third-party integrations
 *
 * @example
 * ```typescript
 * import {
 *   CategorizationEngine,
 *   LocalEmbeddings,
 *   loadDefaultCategories,
 * } from '@quecat/core';
 *
 * const engine = await CategorizationEngine.create(
 *   new LocalEmbeddings(),
 *   await loadDefaultCategories(),
 * );
 * const result = await engine.categorize('Ürün hasarlı geldi');
 * ```
 */

// =============================================================================
// ENGINE
// =============================================================================

export { CategorizationEngine } from './engine/engine.js';
export { serializeResult } from './engine/ranking.js';
export type {
  ClassificationResult,
  ClassificationResultJson,
  EngineOptions,
  EngineState,
  EngineStatus,
  PrototypeVector,
  ScoringMethod,
} from './engine/types.js';
export { cosineSimilarity, centroid, clampUnit } from './engine/similarity.js';

// =============================================================================
// CATEGORIES
// =============================================================================

export { loadCategories, loadDefaultCategories, parseCategoryCatalog } from './categories/catalog.js';
export { CategorySchema, CategoryCatalogSchema } from './categories/schema.js';
export { DEFAULT_CATEGORY_IDS } from './categories/types.js';
export type { Category, DefaultCategoryId } from './categories/types.js';
export { SAMPLE_QUESTIONS } from './categories/samples.js';

// =============================================================================
// EMBEDDINGS
// =============================================================================

export { LocalEmbeddings } from './embeddings/local.js';
export type { LocalEmbeddingsOptions } from './embeddings/local.js';
export { resolveEmbeddingDevice } from './embeddings/device.js';
export type { EmbeddingDevice } from './embeddings/device.js';
export type { EmbeddingService } from './embeddings/types.js';

// =============================================================================
// ERRORS
// =============================================================================

export {
  QuecatError,
  QuecatErrorCode,
  ConfigError,
  EmbeddingError,
  InitializationError,
  CategorizationError,
  isQuecatError,
  getErrorMessage,
  getErrorStack,
} from './errors/index.js';
export type { ErrorSeverity, InitializationErrorKind, CategorizationErrorKind } from './errors/index.js';

// =============================================================================
// LOGGING
// =============================================================================

export { consoleLogger, createJsonLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';

// =============================================================================
// CONSTANTS
// =============================================================================

export {
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_HIGH_SIMILARITY_THRESHOLD,
  DEFAULT_PORT,
  DEFAULT_INIT_ATTEMPTS,
  DEFAULT_INIT_RETRY_DELAY_MS,
  SCORING_METHOD,
} from './constants.js';

// =============================================================================
// UTILITIES
// =============================================================================

export { Ok, Err, isOk, isErr } from './utils/result.js';
export type { Result } from './utils/result.js';
export { readPackageVersion } from './utils/version.js';
