import { CategorizationError, type Logger, getErrorMessage } from '@quecat/core';

export interface ErrorResponse {
  status: number;
  body: { success: false; message: string; kind?: string };
}

/**
 * Map an error from the engine onto an HTTP response. Client mistakes become
 * 4xx, an engine still warming up 503, everything else 500.
 */
export function toErrorResponse(error: unknown, logger: Logger): ErrorResponse {
  if (error instanceof CategorizationError) {
    switch (error.kind) {
      case 'EmptyInput':
        return { status: 400, body: { success: false, message: error.message, kind: error.kind } };
      case 'EngineNotReady':
        return { status: 503, body: { success: false, message: error.message, kind: error.kind } };
      case 'EmbeddingFailure':
        logger.error(`Categorization failed: ${error.message}`);
        return { status: 500, body: { success: false, message: error.message, kind: error.kind } };
    }
  }

  logger.error(`Unexpected error: ${getErrorMessage(error)}`);
  return { status: 500, body: { success: false, message: 'Internal server error' } };
}
