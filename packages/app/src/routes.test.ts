import { describe, it, expect, beforeEach } from 'vitest';
import { CategorizationEngine, SAMPLE_QUESTIONS } from '@quecat/core';
import { handleRoute, SERVICE_NAME, type ServiceContext } from './routes.js';
import { createTestContext, StubEmbeddings, TEST_CATEGORIES, TEST_VECTORS } from './test-helpers.js';

function post(body?: string) {
  return { method: 'POST', path: '/categorize', body };
}

describe('handleRoute', () => {
  let embeddings: StubEmbeddings;
  let ctx: ServiceContext;

  beforeEach(() => {
    embeddings = new StubEmbeddings(TEST_VECTORS);
    ctx = createTestContext({ engine: new CategorizationEngine(embeddings) });
  });

  describe('POST /categorize', () => {
    beforeEach(async () => {
      await ctx.engine.initialize(TEST_CATEGORIES);
    });

    it('should return the best matching category', async () => {
      const response = await handleRoute(ctx, post(JSON.stringify({ question: 'Ürün arızalı' })));

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        success: true,
        data: { categoryId: 'teknik', displayName: 'teknik', method: 'embedding', isHighSimilarity: true },
      });
    });

    it('should report every similarity in category order', async () => {
      const response = await handleRoute(ctx, post(JSON.stringify({ question: 'Ürün arızalı' })));
      const { data } = response.body as { data: { similarities: Record<string, number>; confidence: number } };

      expect(Object.keys(data.similarities)).toEqual(['stok', 'teknik']);
      expect(data.similarities.stok).toBeCloseTo(0.6, 5);
      expect(data.similarities.teknik).toBeCloseTo(0.8, 5);
      expect(data.confidence).toBeCloseTo(0.8, 5);
    });

    it('should report a category whose id is __proto__', async () => {
      const protoCtx = createTestContext();
      await protoCtx.engine.initialize([
        { id: '__proto__', displayName: 'proto', examples: ['Bu ürün stokta var mı?'] },
        { id: 'teknik', displayName: 'teknik', examples: ['Ürün çalışmıyor'] },
      ]);

      const response = await handleRoute(protoCtx, post(JSON.stringify({ question: 'Bu ürün stokta var mı?' })));

      expect(JSON.stringify(response.body)).toContain('"similarities":{"__proto__":1,"teknik":0}');
    });

    it('should trim the question before embedding', async () => {
      const response = await handleRoute(ctx, post(JSON.stringify({ question: '  Bu ürün stokta var mı?\n' })));

      expect(response.body).toMatchObject({ data: { categoryId: 'stok', confidence: 1 } });
    });

    it('should reject a blank question with 400', async () => {
      const response = await handleRoute(ctx, post(JSON.stringify({ question: '   ' })));

      expect(response).toEqual({
        status: 400,
        body: { success: false, message: 'Question must not be empty', kind: 'EmptyInput' },
      });
    });

    it('should reject a missing question field', async () => {
      const response = await handleRoute(ctx, post('{}'));

      expect(response).toEqual({ status: 400, body: { success: false, message: 'question is required' } });
    });

    it('should reject a non-string question', async () => {
      const response = await handleRoute(ctx, post(JSON.stringify({ question: 42 })));

      expect(response).toEqual({ status: 400, body: { success: false, message: 'question must be a string' } });
    });

    it('should reject malformed JSON', async () => {
      const response = await handleRoute(ctx, post('{question:'));

      expect(response).toEqual({ status: 400, body: { success: false, message: 'Request body must be valid JSON' } });
    });

    it('should reject an empty body', async () => {
      const response = await handleRoute(ctx, post());

      expect(response.status).toBe(400);
    });

    it('should map embedding failures to 500', async () => {
      embeddings.failOn.add('Ürün arızalı');

      const response = await handleRoute(ctx, post(JSON.stringify({ question: 'Ürün arızalı' })));

      expect(response).toEqual({
        status: 500,
        body: {
          success: false,
          message: 'Failed to embed question: inference crashed',
          kind: 'EmbeddingFailure',
        },
      });
    });
  });

  it('should answer 503 while the engine is not ready', async () => {
    const response = await handleRoute(ctx, post(JSON.stringify({ question: 'Ürün arızalı' })));

    expect(response).toEqual({
      status: 503,
      body: { success: false, message: 'Categorization engine is not initialized', kind: 'EngineNotReady' },
    });
  });

  describe('GET /health', () => {
    it('should report starting before initialization', async () => {
      const response = await handleRoute(ctx, { method: 'GET', path: '/health' });

      expect(response).toEqual({
        status: 503,
        body: {
          success: false,
          status: 'starting',
          service: SERVICE_NAME,
          engine: 'uninitialized',
          categories: 0,
          timestamp: '2026-03-04T05:06:07.000Z',
        },
      });
    });

    it('should report healthy once ready', async () => {
      await ctx.engine.initialize(TEST_CATEGORIES);

      const response = await handleRoute(ctx, { method: 'GET', path: '/health' });

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ success: true, status: 'healthy', engine: 'ready', categories: 2 });
    });
  });

  describe('GET /test', () => {
    it('should answer 503 before initialization', async () => {
      const response = await handleRoute(ctx, { method: 'GET', path: '/test' });

      expect(response.status).toBe(503);
    });

    it('should categorize every sample question and keep failures per question', async () => {
      await ctx.engine.initialize(TEST_CATEGORIES);
      embeddings.failOn.add(SAMPLE_QUESTIONS.yanlis_hasarli);

      const response = await handleRoute(ctx, { method: 'GET', path: '/test' });
      const { testResults } = response.body as { testResults: unknown[] };

      expect(response.status).toBe(200);
      expect(testResults).toHaveLength(9);
      expect(testResults[0]).toEqual({
        question: SAMPLE_QUESTIONS.yorum,
        category: 'stok',
        categoryName: 'stok',
        confidence: 0,
      });
      expect(testResults[3]).toEqual({
        question: 'Ürün hasarlı geldi',
        error: 'Failed to embed question: inference crashed',
      });
      expect(testResults[6]).toEqual({
        question: 'Bu ürün stokta var mı?',
        category: 'stok',
        categoryName: 'stok',
        confidence: 1,
      });
    });
  });

  it('should describe the service on GET /', async () => {
    await ctx.engine.initialize(TEST_CATEGORIES);

    const response = await handleRoute(ctx, { method: 'GET', path: '/' });

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      service: SERVICE_NAME,
      version: '9.9.9',
      embeddingModel: 'test/model',
      categories: ['stok', 'teknik'],
    });
  });

  it('should return 404 for unknown paths', async () => {
    const response = await handleRoute(ctx, { method: 'GET', path: '/constructor' });

    expect(response).toEqual({ status: 404, body: { success: false, message: 'Not found: /constructor' } });
  });

  it('should return 405 with an Allow header for the wrong method', async () => {
    const response = await handleRoute(ctx, { method: 'GET', path: '/categorize' });

    expect(response).toEqual({
      status: 405,
      body: { success: false, message: 'Method GET not allowed on /categorize' },
      headers: { Allow: 'POST' },
    });
  });
});
