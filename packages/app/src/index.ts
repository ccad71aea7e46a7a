/**
 * Question categorization HTTP service
 *
 * Loads the category catalog, starts listening right away and builds the
 * category prototypes in the background. /health reports 503 until the
 * engine is ready.
 */

import {
  CategorizationEngine,
  LocalEmbeddings,
  consoleLogger,
  createJsonLogger,
  getErrorMessage,
  loadCategories,
  loadDefaultCategories,
  readPackageVersion,
  type Logger,
} from '@quecat/core';

import { loadConfig } from './config.js';
import { initializeWithRetry } from './bootstrap.js';
import { setupGracefulShutdown, startServer } from './server.js';

async function main(): Promise<void> {
  let logger: Logger = consoleLogger;

  try {
    const config = loadConfig();
    if (config.logFormat === 'json') {
      logger = createJsonLogger('quecat-app');
    }

    const categories = config.categoriesPath
      ? await loadCategories(config.categoriesPath)
      : await loadDefaultCategories();

    const embeddings = new LocalEmbeddings({ model: config.model, device: config.device });
    const engine = new CategorizationEngine(embeddings, {
      logger,
      highSimilarityThreshold: config.highSimilarityThreshold,
    });

    const server = startServer(
      { engine, logger, modelName: embeddings.modelName, version: readPackageVersion(import.meta.url) },
      config.port,
      config.maxBodyBytes
    );
    setupGracefulShutdown(server, embeddings, logger);

    logger.info(`Loading embedding model ${embeddings.modelName} for ${categories.length} categories`);
    await initializeWithRetry(engine, categories, {
      attempts: config.initAttempts,
      delayMs: config.initRetryDelayMs,
      logger,
    });
  } catch (error) {
    logger.error(`Failed to start: ${getErrorMessage(error)}`);
    process.exit(1);
  }
}

void main();
