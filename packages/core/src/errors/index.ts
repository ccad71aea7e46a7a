import { QuecatErrorCode } from './codes.js';

// Re-export for consumers
export { QuecatErrorCode } from './codes.js';

/**
 * Severity levels for errors
 */
export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

/**
 * Base error class for all quecat-specific errors
 */
export class QuecatError extends Error {
  constructor(
    message: string,
    public readonly code: QuecatErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly severity: ErrorSeverity = 'medium',
    public readonly recoverable: boolean = true,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'QuecatError';

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.message,
      code: this.code,
      severity: this.severity,
      recoverable: this.recoverable,
      context: this.context,
    };
  }

  isRetryable(): boolean {
    return this.retryable;
  }

  isRecoverable(): boolean {
    return this.recoverable;
  }
}

/**
 * Configuration-related errors (env vars, category catalog files)
 */
export class ConfigError extends QuecatError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, QuecatErrorCode.CONFIG_INVALID, context, 'medium', true, false);
    this.name = 'ConfigError';
  }
}

/**
 * Embedding generation errors
 */
export class EmbeddingError extends QuecatError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, QuecatErrorCode.EMBEDDING_GENERATION_FAILED, context, 'high', true, true);
    this.name = 'EmbeddingError';
  }
}

/**
 * `DuplicateCategoryId` covers every unusable category set: repeated ids,
 * an empty list, blank ids and categories without example phrases.
 */
export type InitializationErrorKind = 'DuplicateCategoryId' | 'EmbeddingUnavailable';

/**
 * Raised while building prototype vectors. The engine stays uninitialized,
 * so the caller may retry.
 */
export class InitializationError extends QuecatError {
  constructor(
    public readonly kind: InitializationErrorKind,
    message: string,
    context?: Record<string, unknown>
  ) {
    const embeddingSide = kind === 'EmbeddingUnavailable';
    super(
      message,
      embeddingSide ? QuecatErrorCode.EMBEDDING_MODEL_FAILED : QuecatErrorCode.ENGINE_INIT_FAILED,
      context,
      embeddingSide ? 'critical' : 'high',
      true,
      embeddingSide
    );
    this.name = 'InitializationError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), kind: this.kind };
  }
}

export type CategorizationErrorKind = 'EngineNotReady' | 'EmptyInput' | 'EmbeddingFailure';

const CATEGORIZATION_CODES: Record<CategorizationErrorKind, QuecatErrorCode> = {
  EngineNotReady: QuecatErrorCode.ENGINE_NOT_READY,
  EmptyInput: QuecatErrorCode.INVALID_INPUT,
  EmbeddingFailure: QuecatErrorCode.EMBEDDING_GENERATION_FAILED,
};

/**
 * Raised by a single categorize call. Never replaced by a fallback category.
 */
export class CategorizationError extends QuecatError {
  constructor(
    public readonly kind: CategorizationErrorKind,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(
      message,
      CATEGORIZATION_CODES[kind],
      context,
      kind === 'EmptyInput' ? 'low' : 'high',
      true,
      kind !== 'EmptyInput'
    );
    this.name = 'CategorizationError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), kind: this.kind };
  }
}

/**
 * Type guard to check if an error is a QuecatError
 */
export function isQuecatError(error: unknown): error is QuecatError {
  return error instanceof QuecatError;
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Extract stack trace from unknown error type
 */
export function getErrorStack(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.stack;
  }
  return undefined;
}
