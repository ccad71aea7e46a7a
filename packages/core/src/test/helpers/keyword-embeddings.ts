import type { EmbeddingService } from '../../embeddings/types.js';

/**
 * Split text into lowercase word tokens (Turkish casing rules).
 */
export function tokenize(text: string): string[] {
  return text
    .toLocaleLowerCase('tr-TR')
    .split(/[^\p{L}\p{N}]+/u)
    .filter(token => token.length > 0);
}

/**
 * Deterministic bag-of-words embeddings for tests: one dimension per
 * vocabulary word, holding that word's count. Texts listed in `fixed`
 * return the given vector verbatim, so tests can pin exact geometry.
 */
export class KeywordEmbeddings implements EmbeddingService {
  /** Every text passed to embed(), in call order */
  readonly calls: string[] = [];
  initializeCalls = 0;
  private readonly index: Map<string, number>;

  constructor(
    vocabulary: readonly string[],
    private readonly fixed: ReadonlyMap<string, readonly number[]> = new Map()
  ) {
    this.index = new Map(vocabulary.map((word, i) => [word, i]));
  }

  /**
   * Vocabulary made of every distinct token in the given texts.
   */
  static fromTexts(texts: readonly string[]): KeywordEmbeddings {
    return new KeywordEmbeddings([...new Set(texts.flatMap(tokenize))]);
  }

  get dimension(): number {
    return this.index.size;
  }

  async initialize(): Promise<void> {
    this.initializeCalls++;
  }

  async embed(text: string): Promise<Float32Array> {
    this.calls.push(text);

    const pinned = this.fixed.get(text);
    if (pinned) {
      return Float32Array.from(pinned);
    }

    const vector = new Float32Array(this.index.size);
    for (const token of tokenize(text)) {
      const i = this.index.get(token);
      if (i !== undefined) {
        vector[i] += 1;
      }
    }
    return vector;
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    return Promise.all(texts.map(text => this.embed(text)));
  }

  async dispose(): Promise<void> {
    // Nothing to release
  }
}
