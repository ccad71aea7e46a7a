/**
 * Error codes for all quecat-specific errors.
 * Used to identify error types programmatically.
 */
export enum QuecatErrorCode {
  // Configuration
  CONFIG_INVALID = 'CONFIG_INVALID',

  // Engine lifecycle
  ENGINE_INIT_FAILED = 'ENGINE_INIT_FAILED',
  ENGINE_NOT_READY = 'ENGINE_NOT_READY',

  // Embeddings
  EMBEDDING_MODEL_FAILED = 'EMBEDDING_MODEL_FAILED',
  EMBEDDING_GENERATION_FAILED = 'EMBEDDING_GENERATION_FAILED',

  // Input
  INVALID_INPUT = 'INVALID_INPUT',

  // System
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
