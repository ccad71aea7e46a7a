import { setTimeout as sleep } from 'timers/promises';
import {
  InitializationError,
  getErrorMessage,
  type CategorizationEngine,
  type Category,
  type EngineState,
  type Logger,
} from '@quecat/core';

export interface InitRetryOptions {
  attempts: number;
  delayMs: number;
  logger: Logger;
  wait?: (ms: number) => Promise<unknown>;
}

/**
 * Initialize the engine, retrying failures the engine marks as retryable
 * (the embedding model failing to load). Invalid category sets fail at once.
 */
export async function initializeWithRetry(
  engine: CategorizationEngine,
  categories: readonly Category[],
  options: InitRetryOptions
): Promise<EngineState> {
  const { attempts, delayMs, logger } = options;
  const wait = options.wait ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      const state = await engine.initialize(categories);
      logger.info(`Engine ready with ${state.categories.length} categories`);
      return state;
    } catch (error) {
      const retryable = error instanceof InitializationError && error.isRetryable();
      if (!retryable || attempt >= attempts) {
        throw error;
      }
      logger.warning(
        `Engine initialization failed (attempt ${attempt}/${attempts}): ${getErrorMessage(error)}; ` +
          `retrying in ${delayMs}ms`
      );
      await wait(delayMs);
    }
  }
}
