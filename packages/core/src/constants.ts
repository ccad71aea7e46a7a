/**
 * Centralized constants for @quecat/core.
 * Magic numbers and configuration defaults live here.
 */

// Embedding model configuration
export const DEFAULT_EMBEDDING_MODEL = 'Xenova/all-MiniLM-L6-v2';

// Scoring
export const SCORING_METHOD = 'embedding';
// Confidence at or above this marks a result as a high-similarity match
export const DEFAULT_HIGH_SIMILARITY_THRESHOLD = 0.7;

// HTTP service
export const DEFAULT_PORT = 5002;
export const DEFAULT_INIT_ATTEMPTS = 3;
export const DEFAULT_INIT_RETRY_DELAY_MS = 2000;
