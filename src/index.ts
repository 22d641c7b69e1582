import http from 'node:http';
import { loadConfig } from './config.js';
import { createEngine } from './engine.js';
import {
  AuthError,
  InvalidInputError,
  MissingCodeError,
  NetworkError,
  NotFoundError,
  StopResolutionError,
  UpstreamError
} from './errors.js';
import { logger } from './log.js';
import { isRecord } from './validation.js';

const config = loadConfig();
const engine = createEngine(config);

type ResponseHeaders = Record<string, string>;

class PayloadTooLargeError extends Error {
  constructor() {
    super('Payload too large');
    this.name = 'PayloadTooLargeError';
  }
}

function sendJson(
  res: http.ServerResponse,
  statusCode: number,
  payload: unknown,
  extraHeaders: ResponseHeaders = {}
): void {
  const body = JSON.stringify(payload);
  res.writeHead(statusCode, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(body).toString(),
    ...extraHeaders
  });
  res.end(body);
}

function parseRequestBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;
    const LIMIT = 1024 * 64; // 64KB

    req.on('data', (chunk: Buffer) => {
      total += chunk.length;
      if (total > LIMIT) {
        reject(new PayloadTooLargeError());
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });

    req.on('error', (error) => reject(error));

    req.on('end', () => {
      try {
        const raw = Buffer.concat(chunks).toString('utf-8') || '{}';
        resolve(JSON.parse(raw));
      } catch (error) {
        reject(new InvalidInputError('Request body is not valid JSON', String(error)));
      }
    });
  });
}

function statusFor(error: StopResolutionError): number {
  if (error instanceof InvalidInputError) return 400;
  if (error instanceof NotFoundError) return 404;
  if (error instanceof MissingCodeError) return 422;
  if (error instanceof NetworkError) return 504;
  if (error instanceof AuthError || error instanceof UpstreamError) return 503;
  return 500;
}

function requirePost(req: http.IncomingMessage, res: http.ServerResponse): boolean {
  if (req.method === 'POST') {
    return true;
  }
  sendJson(res, 405, { error: 'Method not allowed' }, { Allow: 'POST' });
  return false;
}

const server = http.createServer(async (req, res) => {
  const url = req.url ? new URL(req.url, 'http://localhost') : null;
  const pathname = url?.pathname ?? '/';

  try {
    if (req.method === 'GET' && pathname === '/healthz') {
      sendJson(res, 200, { status: 'ok' });
      return;
    }

    if (pathname === '/query') {
      if (!requirePost(req, res)) return;
      const payload = await parseRequestBody(req);
      const result = await engine.handle(payload);
      sendJson(res, 200, result);
      return;
    }

    if (pathname === '/reset') {
      if (!requirePost(req, res)) return;
      const payload = await parseRequestBody(req);
      if (!isRecord(payload) || typeof payload.userId !== 'string' || !payload.userId) {
        throw new InvalidInputError('userId is required');
      }
      sendJson(res, 200, { reset: engine.reset(payload.userId) });
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  } catch (error) {
    if (error instanceof PayloadTooLargeError) {
      sendJson(res, 413, { error: error.message });
      return;
    }

    if (error instanceof StopResolutionError) {
      const status = statusFor(error);
      const causeMessage =
        error.cause instanceof Error
          ? error.cause.message
          : error.cause !== undefined
            ? String(error.cause)
            : undefined;

      logger.error('Request failed', {
        kind: error.name,
        upstream: error.service,
        status,
        error: error.message,
        cause: causeMessage
      });
      sendJson(res, status, {
        error: error.message,
        kind: error.name,
        ...(error instanceof InvalidInputError && error.details !== undefined ? { details: error.details } : {})
      });
      return;
    }

    logger.error('Unhandled server error', {
      error: error instanceof Error ? error.message : String(error)
    });
    sendJson(res, 500, { error: 'Internal server error' });
  }
});

server.listen(config.port, () => {
  logger.info('Server started', { port: config.port });
});

export default server;
