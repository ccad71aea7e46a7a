/**
 * Test harness for the HTTP service.
 *
 * Provides an in-process embedding stub and a ready-made service context,
 * so routes can be exercised without loading a model or opening a socket.
 */

import { CategorizationEngine, silentLogger, type Category, type EmbeddingService } from '@quecat/core';
import type { ServiceContext } from './routes.js';

/**
 * Embedding stub returning pinned vectors. Unknown texts map to the zero
 * vector; texts in `failOn` throw.
 */
export class StubEmbeddings implements EmbeddingService {
  readonly failOn = new Set<string>();
  failInitialize = 0;
  initializeCalls = 0;

  constructor(
    private readonly vectors: ReadonlyMap<string, readonly number[]>,
    private readonly dimension = 2,
  ) {}

  async initialize(): Promise<void> {
    this.initializeCalls++;
    if (this.failInitialize > 0) {
      this.failInitialize--;
      throw new Error('model download failed');
    }
  }

  async embed(text: string): Promise<Float32Array> {
    if (this.failOn.has(text)) {
      throw new Error('inference crashed');
    }
    return Float32Array.from(this.vectors.get(text) ?? new Array<number>(this.dimension).fill(0));
  }

  async embedBatch(texts: string[]): Promise<Float32Array[]> {
    return Promise.all(texts.map(text => this.embed(text)));
  }

  async dispose(): Promise<void> {}
}

export const TEST_CATEGORIES: Category[] = [
  { id: 'stok', displayName: 'stok', examples: ['Bu ürün stokta var mı?'] },
  { id: 'teknik', displayName: 'teknik', examples: ['Ürün çalışmıyor'] },
];

export const TEST_VECTORS = new Map<string, readonly number[]>([
  ['Bu ürün stokta var mı?', [1, 0]],
  ['Ürün çalışmıyor', [0, 1]],
  ['Ürün arızalı', [0.6, 0.8]],
]);

/**
 * Create a service context with sensible defaults.
 * Override any field via the overrides parameter.
 */
export function createTestContext(overrides?: Partial<ServiceContext>): ServiceContext {
  return {
    engine: new CategorizationEngine(new StubEmbeddings(TEST_VECTORS)),
    logger: silentLogger,
    modelName: 'test/model',
    version: '9.9.9',
    now: () => new Date('2026-03-04T05:06:07.000Z'),
    ...overrides,
  };
}
