import {
  SAMPLE_QUESTIONS,
  serializeResult,
  isOk,
  type CategorizationEngine,
  type Logger,
} from '@quecat/core';
import { CategorizeRequestSchema } from './schemas.js';
import { toErrorResponse } from './errors.js';

export const SERVICE_NAME = 'Question Categorization Service';

export interface ServiceContext {
  engine: CategorizationEngine;
  logger: Logger;
  modelName: string;
  version: string;
  now?: () => Date;
}

export interface RouteRequest {
  method: string;
  path: string;
  body?: string;
}

export interface RouteResponse {
  status: number;
  body: unknown;
  headers?: Record<string, string>;
}

type Handler = (ctx: ServiceContext, req: RouteRequest) => Promise<RouteResponse> | RouteResponse;

const ENDPOINTS: Record<string, string> = {
  'POST /categorize': 'Categorize a question',
  'GET /test': 'Categorize one sample question per category',
  'GET /health': 'Health and readiness check',
  'GET /': 'Service description (this page)',
};

function badRequest(message: string): RouteResponse {
  return { status: 400, body: { success: false, message } };
}

async function categorize(ctx: ServiceContext, req: RouteRequest): Promise<RouteResponse> {
  let raw: unknown;
  try {
    raw = JSON.parse(req.body ?? '');
  } catch {
    return badRequest('Request body must be valid JSON');
  }

  const parsed = CategorizeRequestSchema.safeParse(raw);
  if (!parsed.success) {
    return badRequest(parsed.error.issues[0]?.message ?? 'Invalid request body');
  }

  try {
    const result = await ctx.engine.categorize(parsed.data.question);
    return { status: 200, body: { success: true, data: serializeResult(result) } };
  } catch (error) {
    return toErrorResponse(error, ctx.logger);
  }
}

async function runSamples(ctx: ServiceContext): Promise<RouteResponse> {
  if (!ctx.engine.isReady) {
    return { status: 503, body: { success: false, message: 'Categorization engine is not initialized' } };
  }

  const questions = Object.values(SAMPLE_QUESTIONS);
  const results = await ctx.engine.categorizeMany(questions);

  const testResults = results.map((result, i) =>
    isOk(result)
      ? {
          question: questions[i],
          category: result.value.categoryId,
          categoryName: result.value.displayName,
          confidence: Math.round(result.value.confidence * 1000) / 1000,
        }
      : { question: questions[i], error: result.error.message }
  );

  return { status: 200, body: { success: true, testResults } };
}

function health(ctx: ServiceContext): RouteResponse {
  const timestamp = (ctx.now ?? (() => new Date()))().toISOString();
  const ready = ctx.engine.isReady;

  return {
    status: ready ? 200 : 503,
    body: {
      success: ready,
      status: ready ? 'healthy' : 'starting',
      service: SERVICE_NAME,
      engine: ctx.engine.status,
      categories: ctx.engine.categories.length,
      timestamp,
    },
  };
}

function describeService(ctx: ServiceContext): RouteResponse {
  return {
    status: 200,
    body: {
      service: SERVICE_NAME,
      version: ctx.version,
      description: 'Semantic question categorization with sentence embeddings',
      embeddingModel: ctx.modelName,
      categories: ctx.engine.categories.map(category => category.id),
      endpoints: ENDPOINTS,
      usageExample: {
        url: 'POST /categorize',
        request: { question: 'Bu ürün orijinal mi?' },
      },
    },
  };
}

const ROUTES = new Map<string, Map<string, Handler>>([
  ['/categorize', new Map<string, Handler>([['POST', categorize]])],
  ['/test', new Map<string, Handler>([['GET', runSamples]])],
  ['/health', new Map<string, Handler>([['GET', health]])],
  ['/', new Map<string, Handler>([['GET', describeService]])],
]);

/**
 * Dispatch one request. Transport-independent so it can be exercised
 * without opening a socket.
 */
export async function handleRoute(ctx: ServiceContext, req: RouteRequest): Promise<RouteResponse> {
  const methods = ROUTES.get(req.path);
  if (!methods) {
    return { status: 404, body: { success: false, message: `Not found: ${req.path}` } };
  }

  const handler = methods.get(req.method);
  if (!handler) {
    return {
      status: 405,
      body: { success: false, message: `Method ${req.method} not allowed on ${req.path}` },
      headers: { Allow: [...methods.keys()].join(', ') },
    };
  }

  return handler(ctx, req);
}
