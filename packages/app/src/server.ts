import http from 'node:http';
import { QuecatError, QuecatErrorCode, getErrorMessage, type EmbeddingService, type Logger } from '@quecat/core';
import { handleRoute, type RouteResponse, type ServiceContext } from './routes.js';

export class PayloadTooLargeError extends QuecatError {
  constructor(public readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`, QuecatErrorCode.INVALID_INPUT, { limit }, 'low');
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * Collect a request body as UTF-8, refusing anything over maxBytes.
 */
export async function readBody(stream: AsyncIterable<Buffer | string>, maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of stream) {
    const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    size += buffer.length;
    if (size > maxBytes) {
      throw new PayloadTooLargeError(maxBytes);
    }
    chunks.push(buffer);
  }

  return Buffer.concat(chunks).toString('utf-8');
}

/** The parts of an incoming request the service reads */
export type RequestSource = AsyncIterable<Buffer | string> & {
  method?: string;
  url?: string;
};

/** The parts of a response the service writes; http.ServerResponse satisfies it */
export interface ResponseSink {
  readonly headersSent: boolean;
  writeHead(status: number, headers: Record<string, string>): unknown;
  end(body?: string): unknown;
}

function send(res: ResponseSink, response: RouteResponse): void {
  res.writeHead(response.status, {
    'Content-Type': 'application/json; charset=utf-8',
    ...response.headers,
  });
  res.end(JSON.stringify(response.body));
}

async function respond(
  ctx: ServiceContext,
  maxBodyBytes: number,
  req: RequestSource,
  res: ResponseSink
): Promise<void> {
  const method = req.method ?? 'GET';
  const path = new URL(req.url ?? '/', 'http://localhost').pathname;

  let body: string | undefined;
  if (method === 'POST') {
    try {
      body = await readBody(req, maxBodyBytes);
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        send(res, { status: 413, body: { success: false, message: error.message } });
        return;
      }
      throw error;
    }
  }

  send(res, await handleRoute(ctx, { method, path, body }));
}

/**
 * Serve one request. Never rejects: unexpected failures are logged and
 * answered with a generic 500.
 */
export async function handleRequest(
  ctx: ServiceContext,
  maxBodyBytes: number,
  req: RequestSource,
  res: ResponseSink
): Promise<void> {
  try {
    await respond(ctx, maxBodyBytes, req, res);
  } catch (error: unknown) {
    ctx.logger.error(`Request ${req.method} ${req.url} failed: ${getErrorMessage(error)}`);
    if (!res.headersSent) {
      send(res, { status: 500, body: { success: false, message: 'Internal server error' } });
    } else {
      res.end();
    }
  }
}

export function createRequestListener(ctx: ServiceContext, maxBodyBytes: number): http.RequestListener {
  return (req, res) => {
    void handleRequest(ctx, maxBodyBytes, req, res);
  };
}

export function startServer(ctx: ServiceContext, port: number, maxBodyBytes: number): http.Server {
  const server = http.createServer(createRequestListener(ctx, maxBodyBytes));

  server.listen(port, () => {
    ctx.logger.info(`Question categorization service listening on port ${port}`);
    ctx.logger.info('Categorize: POST /categorize');
    ctx.logger.info('Health check: GET /health');
  });

  return server;
}

/**
 * Graceful shutdown: stop accepting connections, let in-flight requests
 * finish, then release the embedding model.
 */
export function setupGracefulShutdown(
  server: http.Server,
  embeddings: EmbeddingService,
  logger: Logger,
  timeoutMs = 10_000
): void {
  let shuttingDown = false;

  const shutdown = () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...');

    const timeout = setTimeout(() => {
      logger.warning('Shutdown timeout, exiting with open connections');
      process.exit(1);
    }, timeoutMs);

    server.close(() => {
      logger.info('HTTP server closed');
      void embeddings
        .dispose()
        .catch((error: unknown) => logger.error(`Failed to release embedding model: ${getErrorMessage(error)}`))
        .finally(() => {
          clearTimeout(timeout);
          process.exit(0);
        });
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}
