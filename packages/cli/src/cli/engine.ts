import {
  CategorizationEngine,
  LocalEmbeddings,
  consoleLogger,
  loadCategories,
  loadDefaultCategories,
  resolveEmbeddingDevice,
  silentLogger,
  type Category,
} from '@quecat/core';
import { TaskSpinner, formatCategoryCount, formatDuration, handleCommandError } from './utils.js';

export interface EngineCommandOptions {
  model?: string;
  categories?: string;
  device?: string;
  verbose?: boolean;
}

export function loadCategorySet(path?: string): Promise<Category[]> {
  return path ? loadCategories(path) : loadDefaultCategories();
}

/**
 * Load the catalog and model, run `task` against a ready engine, and always
 * release the model afterwards. Failures are reported and set a non-zero
 * exit code.
 */
export async function withEngine(
  options: EngineCommandOptions,
  task: (engine: CategorizationEngine) => Promise<void>
): Promise<void> {
  const spinner = new TaskSpinner('Loading category catalog...');
  let embeddings: LocalEmbeddings | null = null;

  try {
    const started = Date.now();
    const categories = await loadCategorySet(options.categories);
    embeddings = new LocalEmbeddings({ model: options.model, device: resolveEmbeddingDevice(options.device) });

    spinner.update(`Embedding examples for ${formatCategoryCount(categories.length)} with ${embeddings.modelName}...`);
    const engine = await CategorizationEngine.create(embeddings, categories, {
      logger: options.verbose ? consoleLogger : silentLogger,
    });
    spinner.succeed(`Loaded ${formatCategoryCount(categories.length)} in ${formatDuration(Date.now() - started)}`);

    await task(engine);
  } catch (error) {
    spinner.stop();
    handleCommandError(error, options.verbose);
    process.exitCode = 1;
  } finally {
    await embeddings?.dispose();
  }
}
