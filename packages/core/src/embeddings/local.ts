import { pipeline, env, type FeatureExtractionPipeline } from '@huggingface/transformers';
import type { EmbeddingService } from './types.js';
import { EmbeddingError, getErrorMessage } from '../errors/index.js';
import { DEFAULT_EMBEDDING_MODEL } from '../constants.js';
import type { EmbeddingDevice } from './device.js';

// Configure transformers.js to cache models locally
env.allowRemoteModels = true;
env.allowLocalModels = true;

// v3 pipeline overloads produce TS2590; pin the single signature used here
const createFeatureExtractor = pipeline as unknown as (
  task: 'feature-extraction',
  model: string,
  options?: { device?: 'webgpu' },
) => Promise<FeatureExtractionPipeline>;

export interface LocalEmbeddingsOptions {
  model?: string;
  device?: EmbeddingDevice;
}

/**
 * Sentence embeddings computed in-process with transformers.js.
 * Mean-pooled and L2-normalized, so cosine similarity equals the dot product.
 */
export class LocalEmbeddings implements EmbeddingService {
  private extractor: FeatureExtractionPipeline | null = null;
  private initPromise: Promise<void> | null = null;
  readonly modelName: string;
  private readonly device: EmbeddingDevice;

  constructor(options: LocalEmbeddingsOptions = {}) {
    this.modelName = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.device = options.device ?? null;
  }

  private async createPipeline(): Promise<FeatureExtractionPipeline> {
    if (this.device === 'webgpu') {
      try {
        return await createFeatureExtractor('feature-extraction', this.modelName, { device: 'webgpu' });
      } catch {
        // WebGPU unavailable, use CPU
      }
    }
    return await createFeatureExtractor('feature-extraction', this.modelName);
  }

  async initialize(): Promise<void> {
    // Prevent multiple simultaneous initializations
    if (this.initPromise) {
      return this.initPromise;
    }

    if (this.extractor) {
      return;
    }

    this.initPromise = (async () => {
      try {
        this.extractor = await this.createPipeline();
      } catch (error: unknown) {
        this.initPromise = null;
        throw new EmbeddingError(`Failed to initialize embedding model: ${getErrorMessage(error)}`, {
          model: this.modelName,
        });
      }
    })();

    return this.initPromise;
  }

  async embed(text: string): Promise<Float32Array> {
    await this.initialize();

    if (!this.extractor) {
      throw new EmbeddingError('Embedding model not initialized');
    }

    let data: unknown;
    try {
      const output = await this.extractor(text, {
        pooling: 'mean',
        normalize: true,
      });
      data = output.data;
    } catch (error: unknown) {
      throw new EmbeddingError(`Failed to generate embedding: ${getErrorMessage(error)}`, {
        textLength: text.length,
      });
    }

    if (!(data instanceof Float32Array)) {
      throw new EmbeddingError('Embedding model returned a non-float32 tensor', { model: this.modelName });
    }
    return data;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    // Each call is sequential inside the pipeline, Promise.all lets them interleave
    return Promise.all(texts.map(text => this.embed(text)));
  }

  async dispose(): Promise<void> {
    if (this.extractor) {
      await this.extractor.dispose();
    }
    this.extractor = null;
    this.initPromise = null;
  }
}
