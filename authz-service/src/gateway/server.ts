/**
 * Decision Gateway - REST + GraphQL over HTTP
 *
 * Endpoints:
 * - GET  /healthz      - Directory store health (200 ok / 503 degraded)
 * - POST /v1/isallowed - Access decision, snake_case JSON body
 * - POST /graphql      - Access decision via graphql-http
 * - OPTIONS *          - CORS preflight
 *
 * Every request runs inside a correlation id scope taken from
 * X-Correlation-ID or generated, and echoed back in the response.
 */

import { STATUS_CODES, createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { createHandler as createHttpHandler } from 'graphql-http/lib/use/http';
import type { Response as GraphQLHttpResponse } from 'graphql-http';
import type { AccessEngine, DirectoryStore } from 'access-engine';
import type { JwtConfig } from '../common/jwt.js';
import {
  createChildLogger,
  generateCorrelationId,
  getCorrelationId,
  withCorrelationId,
} from '../common/logger.js';
import { HttpError, getErrorMessage, toHttpError } from '../common/errors.js';
import { AUTHZ_ERRORS } from '../error-codes.js';
import { createGraphQLSchema, type GatewayContext } from './graphql.js';
import {
  authenticate,
  errorResult,
  handleHealth,
  handleIsAllowed,
  type HandlerResult,
} from './handlers.js';

const log = createChildLogger({ component: 'gateway' });

export const CORRELATION_HEADER = 'X-Correlation-ID';
export const CORS_METHODS = 'GET, POST, OPTIONS';
export const CORS_HEADERS = `User-Agent, Content-Type, Authorization, ${CORRELATION_HEADER}`;
export const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

// ═══════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════

export interface GatewayOptions {
  serviceName: string;
  engine: AccessEngine;
  store: DirectoryStore;
  jwt: JwtConfig;
  /** Allowed origins; `*` allows any */
  corsOrigins: string[];
  /** Request body limit for /v1/isallowed (default: 64 KiB) */
  maxBodyBytes?: number;
}

export interface GatewayInstance {
  server: Server;
  handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void>;
  listen(port: number, host: string): Promise<void>;
  close(): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════════
// CORS
// ═══════════════════════════════════════════════════════════════════

/**
 * CORS response headers for a request origin
 */
export function corsHeaders(origin: string | undefined, allowed: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {
    'Access-Control-Allow-Methods': CORS_METHODS,
    'Access-Control-Allow-Headers': CORS_HEADERS,
    'Access-Control-Expose-Headers': CORRELATION_HEADER,
  };
  if (allowed.includes('*')) {
    headers['Access-Control-Allow-Origin'] = '*';
  } else if (origin && allowed.includes(origin)) {
    headers['Access-Control-Allow-Origin'] = origin;
    headers['Vary'] = 'Origin';
  }
  return headers;
}

// ═══════════════════════════════════════════════════════════════════
// Body / Response helpers
// ═══════════════════════════════════════════════════════════════════

async function readJsonBody(req: IncomingMessage, limit: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > limit) {
      throw new HttpError(413, AUTHZ_ERRORS.PayloadTooLarge, `Request body exceeds ${limit} bytes`);
    }
    chunks.push(buf);
  }

  try {
    return JSON.parse(Buffer.concat(chunks).toString('utf8'));
  } catch (error) {
    throw new HttpError(422, AUTHZ_ERRORS.ValidationError, `Request body is not valid JSON: ${getErrorMessage(error)}`);
  }
}

function sendJson(res: ServerResponse, result: HandlerResult, headers: Record<string, string> = {}): void {
  res.writeHead(result.status, { 'Content-Type': 'application/json; charset=utf-8', ...headers });
  res.end(JSON.stringify(result.body));
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim() !== '' ? first.trim() : undefined;
}

// ═══════════════════════════════════════════════════════════════════
// Gateway
// ═══════════════════════════════════════════════════════════════════

export function createGateway(options: GatewayOptions): GatewayInstance {
  const { engine, store, jwt, corsOrigins, serviceName } = options;
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const startedAt = Date.now();

  const schema = createGraphQLSchema(engine);

  const graphqlHandler = createHttpHandler<GatewayContext>({
    schema,
    context: (req): GatewayContext | GraphQLHttpResponse => {
      try {
        return {
          caller: authenticate(firstHeader(req.raw.headers.authorization), jwt),
          correlationId: getCorrelationId(),
        };
      } catch (error) {
        const http = toHttpError(error);
        return [
          JSON.stringify(http.toBody()),
          {
            status: http.status,
            statusText: STATUS_CODES[http.status] ?? 'Error',
            headers: { 'content-type': 'application/json; charset=utf-8' },
          },
        ];
      }
    },
  });

  async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url || '/', 'http://localhost');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    switch (url.pathname) {
      case '/healthz': {
        if (req.method !== 'GET' && req.method !== 'HEAD') {
          throw methodNotAllowed(req.method, 'GET');
        }
        sendJson(res, await handleHealth(store, { service: serviceName, startedAt }));
        return;
      }

      case '/v1/isallowed': {
        if (req.method !== 'POST') {
          throw methodNotAllowed(req.method, 'POST');
        }
        authenticate(firstHeader(req.headers.authorization), jwt);
        const body = await readJsonBody(req, maxBodyBytes);
        sendJson(res, await handleIsAllowed(engine, body));
        return;
      }

      case '/graphql':
        await graphqlHandler(req, res);
        return;

      default:
        throw new HttpError(404, AUTHZ_ERRORS.NotFound, `No route for ${url.pathname}`);
    }
  }

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const correlationId = firstHeader(req.headers['x-correlation-id']) ?? generateCorrelationId();
    const start = Date.now();

    res.setHeader(CORRELATION_HEADER, correlationId);
    for (const [name, value] of Object.entries(corsHeaders(firstHeader(req.headers.origin), corsOrigins))) {
      res.setHeader(name, value);
    }

    await withCorrelationId(correlationId, async () => {
      try {
        await route(req, res);
      } catch (error) {
        const result = errorResult(toHttpError(error));
        if (res.headersSent) {
          res.end();
        } else {
          sendJson(res, result, allowHeader(error));
        }
      }
      log.debug('Request handled', {
        method: req.method,
        path: req.url,
        status: res.statusCode,
        durationMs: Date.now() - start,
      });
    });
  }

  const server = createServer((req, res) => {
    void handleRequest(req, res);
  });

  return {
    server,
    handleRequest,
    listen: (port, host) =>
      new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
          server.off('error', reject);
          log.info(`${serviceName} started`, {
            host,
            port,
            endpoints: {
              decision: `http://${host}:${port}/v1/isallowed`,
              graphql: `http://${host}:${port}/graphql`,
              health: `http://${host}:${port}/healthz`,
            },
          });
          resolve();
        });
      }),
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

// ═══════════════════════════════════════════════════════════════════
// Method handling
// ═══════════════════════════════════════════════════════════════════

class MethodNotAllowedError extends HttpError {
  readonly allow: string;

  constructor(method: string | undefined, allow: string) {
    super(405, AUTHZ_ERRORS.MethodNotAllowed, `Method ${method ?? 'UNKNOWN'} not allowed`);
    this.allow = allow;
  }
}

function methodNotAllowed(method: string | undefined, allow: string): MethodNotAllowedError {
  return new MethodNotAllowedError(method, allow);
}

function allowHeader(error: unknown): Record<string, string> {
  return error instanceof MethodNotAllowedError ? { Allow: error.allow } : {};
}
