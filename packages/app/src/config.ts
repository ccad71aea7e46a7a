import {
  ConfigError,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_HIGH_SIMILARITY_THRESHOLD,
  DEFAULT_INIT_ATTEMPTS,
  DEFAULT_INIT_RETRY_DELAY_MS,
  DEFAULT_PORT,
  getErrorMessage,
  resolveEmbeddingDevice,
  type EmbeddingDevice,
} from '@quecat/core';

export type LogFormat = 'text' | 'json';

export interface AppConfig {
  /** Port to listen on */
  port: number;
  /** transformers.js model id used for embeddings */
  model: string;
  /** Optional custom category catalog; built-in nine categories when unset */
  categoriesPath: string | undefined;
  device: EmbeddingDevice;
  /** Confidence at or above which a result is flagged as high similarity */
  highSimilarityThreshold: number;
  /** Engine initialization attempts before giving up */
  initAttempts: number;
  initRetryDelayMs: number;
  /** Request bodies larger than this are rejected with 413 */
  maxBodyBytes: number;
  logFormat: LogFormat;
}

const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

function parsePort(value: string | undefined): number {
  const port = parseInt(value ?? String(DEFAULT_PORT), 10);
  if (Number.isNaN(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid PORT: ${value}`);
  }
  return port;
}

function parsePositiveInt(value: string | undefined, fallback: number, name: string): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseNonNegativeInt(value: string | undefined, fallback: number, name: string): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function parseUnitInterval(value: string | undefined, fallback: number, name: string): number {
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new ConfigError(`${name} must be a number between 0 and 1, got "${value}"`);
  }
  return parsed;
}

function parseLogFormat(value: string | undefined): LogFormat {
  if (!value || value === 'text') return 'text';
  if (value === 'json') return 'json';
  throw new ConfigError(`LOG_FORMAT must be "text" or "json", got "${value}"`);
}

function parseDevice(value: string | undefined): EmbeddingDevice {
  try {
    return resolveEmbeddingDevice(value);
  } catch (error) {
    throw new ConfigError(`QUECAT_EMBEDDING_DEVICE: ${getErrorMessage(error)}`);
  }
}

/**
 * Environment variable loading for the HTTP service.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parsePort(env.PORT),
    model: env.QUECAT_MODEL || DEFAULT_EMBEDDING_MODEL,
    categoriesPath: env.QUECAT_CATEGORIES_PATH || undefined,
    device: parseDevice(env.QUECAT_EMBEDDING_DEVICE),
    highSimilarityThreshold: parseUnitInterval(
      env.QUECAT_HIGH_SIMILARITY,
      DEFAULT_HIGH_SIMILARITY_THRESHOLD,
      'QUECAT_HIGH_SIMILARITY'
    ),
    initAttempts: parsePositiveInt(env.QUECAT_INIT_ATTEMPTS, DEFAULT_INIT_ATTEMPTS, 'QUECAT_INIT_ATTEMPTS'),
    initRetryDelayMs: parseNonNegativeInt(
      env.QUECAT_INIT_RETRY_DELAY_MS,
      DEFAULT_INIT_RETRY_DELAY_MS,
      'QUECAT_INIT_RETRY_DELAY_MS'
    ),
    maxBodyBytes: parsePositiveInt(env.QUECAT_MAX_BODY_BYTES, DEFAULT_MAX_BODY_BYTES, 'QUECAT_MAX_BODY_BYTES'),
    logFormat: parseLogFormat(env.LOG_FORMAT),
  };
}
