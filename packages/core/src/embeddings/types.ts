/**
 * Text-to-vector capability the engine depends on. Implementations must be
 * deterministic for a given model and return vectors of one fixed length.
 */
export interface EmbeddingService {
  initialize(): Promise<void>;
  embed(text: string): Promise<Float32Array>;
  embedBatch(texts: string[]): Promise<Float32Array[]>;
  dispose(): Promise<void>;
}
