import type { Category } from '../categories/types.js';
import { DEFAULT_HIGH_SIMILARITY_THRESHOLD } from '../constants.js';
import type { EmbeddingService } from '../embeddings/types.js';
import { CategorizationError, getErrorMessage } from '../errors/index.js';
import { silentLogger, type Logger } from '../logger.js';
import { Err, Ok, type Result } from '../utils/result.js';
import { buildEngineState } from './prototypes.js';
import { buildResult, scorePrototypes } from './ranking.js';
import { isWellFormed } from './similarity.js';
import type { ClassificationResult, EngineOptions, EngineState, EngineStatus } from './types.js';

/**
 * Classifies free text into one of a fixed set of categories by cosine
 * similarity against per-category prototype embeddings.
 *
 * The engine starts `uninitialized`; a successful {@link initialize} moves it
 * to `ready` for good. All state read by {@link categorize} lives in one
 * frozen {@link EngineState} that is only ever replaced as a whole, so
 * concurrent calls need no locking.
 *
 * @example
 * ```typescript
 * const engine = await CategorizationEngine.create(
 *   new LocalEmbeddings(),
 *   await loadDefaultCategories(),
 * );
 * const result = await engine.categorize('Hangi kargo firması?');
 * console.log(result.categoryId, result.confidence);
 * ```
 */
export class CategorizationEngine {
  private state: EngineState | null = null;
  private initPromise: Promise<EngineState> | null = null;
  private generation = 0;
  private publishedGeneration = 0;
  private readonly logger: Logger;
  private readonly highSimilarityThreshold: number;

  constructor(
    private readonly embeddings: EmbeddingService,
    options: EngineOptions = {}
  ) {
    const threshold = options.highSimilarityThreshold ?? DEFAULT_HIGH_SIMILARITY_THRESHOLD;
    if (!(threshold >= 0 && threshold <= 1)) {
      throw new RangeError(`highSimilarityThreshold must be within [0, 1], got ${threshold}`);
    }
    this.highSimilarityThreshold = threshold;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Construct and initialize in one step.
   */
  static async create(
    embeddings: EmbeddingService,
    categories: readonly Category[],
    options: EngineOptions = {}
  ): Promise<CategorizationEngine> {
    const engine = new CategorizationEngine(embeddings, options);
    await engine.initialize(categories);
    return engine;
  }

  get status(): EngineStatus {
    return this.state ? 'ready' : 'uninitialized';
  }

  get isReady(): boolean {
    return this.state !== null;
  }

  /** Categories currently served, in canonical order (empty until ready) */
  get categories(): readonly Category[] {
    return this.state?.categories ?? [];
  }

  get dimension(): number | null {
    return this.state?.dimension ?? null;
  }

  /**
   * Compute prototype vectors and move to `ready`.
   *
   * Concurrent calls share the in-flight computation. Once ready, further
   * calls return the published state; use {@link replaceCategories} to
   * change the category set. On failure the engine stays uninitialized and
   * the call may be retried.
   *
   * @throws {InitializationError}
   */
  async initialize(categories: readonly Category[]): Promise<EngineState> {
    if (this.state) {
      return this.state;
    }

    if (this.initPromise) {
      return this.initPromise;
    }

    this.initPromise = (async () => {
      try {
        const state = await buildEngineState(categories, this.embeddings, this.logger);
        this.state = state;
        return state;
      } finally {
        this.initPromise = null;
      }
    })();

    return this.initPromise;
  }

  /**
   * Swap in a new category set. The new prototypes are built completely
   * before being published; in-flight categorize calls finish against the
   * state they started with. If building fails the previous state keeps
   * serving and the error is thrown. A pending {@link initialize} is waited
   * for first. When two replacements overlap, a result is dropped only if a
   * replacement started later has already been published.
   *
   * @throws {InitializationError}
   */
  async replaceCategories(categories: readonly Category[]): Promise<EngineState> {
    while (this.initPromise) {
      // Its outcome belongs to the initialize caller; only the ordering matters here
      await Promise.allSettled([this.initPromise]);
    }

    if (!this.state) {
      return this.initialize(categories);
    }

    const generation = ++this.generation;
    const next = await buildEngineState(categories, this.embeddings, this.logger);

    if (generation < this.publishedGeneration) {
      this.logger.debug('Discarding category set superseded by a newer one');
      return this.state;
    }

    this.state = next;
    this.publishedGeneration = generation;
    this.logger.info(`Category set replaced (${next.categories.length} categories)`);
    return next;
  }

  /**
   * Classify one question. Embeds it once and ranks every prototype.
   *
   * @throws {CategorizationError} `EngineNotReady`, `EmptyInput` or `EmbeddingFailure`
   */
  async categorize(question: string): Promise<ClassificationResult> {
    // One read; a concurrent replaceCategories cannot change what this call sees
    const state = this.state;
    if (!state) {
      throw new CategorizationError('EngineNotReady', 'Categorization engine is not initialized');
    }

    const text = question.trim();
    if (text === '') {
      throw new CategorizationError('EmptyInput', 'Question must not be empty');
    }

    let vector: Float32Array;
    try {
      vector = await this.embeddings.embed(text);
    } catch (error) {
      throw new CategorizationError('EmbeddingFailure', `Failed to embed question: ${getErrorMessage(error)}`, {
        questionLength: text.length,
      });
    }

    if (!isWellFormed(vector, state.dimension)) {
      throw new CategorizationError('EmbeddingFailure', 'Question embedding is malformed', {
        expectedDimension: state.dimension,
        actualDimension: vector.length,
      });
    }

    return buildResult(state, scorePrototypes(state, vector), this.highSimilarityThreshold);
  }

  /**
   * Classify several questions independently. One failing question does not
   * affect the others.
   */
  async categorizeMany(
    questions: readonly string[]
  ): Promise<Result<ClassificationResult, CategorizationError>[]> {
    return Promise.all(
      questions.map(async question => {
        try {
          return Ok(await this.categorize(question));
        } catch (error) {
          if (error instanceof CategorizationError) {
            return Err(error);
          }
          throw error;
        }
      })
    );
  }
}
