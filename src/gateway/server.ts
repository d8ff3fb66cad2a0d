/**
 * @netlens/gateway - Gateway Server
 *
 * HTTP server for the dashboard assistant. Uses Node.js built-in http
 * module with a manual router; handlers live in AssistantRoutes.
 *
 * A request whose client disconnects before the answer is ready has its
 * AbortSignal fired, which cancels any in-flight provider call.
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import { createLogger, isPlainObject, type Logger } from '@netlens/core';
import { describeError } from '@netlens/fallback';
import type { AssistantRoutes, RouteResponse } from './routes.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GatewayServerOptions {
  routes: AssistantRoutes;
  host: string;
  port: number;
  logger?: Logger;
}

interface RequestContext {
  req: IncomingMessage;
  url: URL;
  signal: AbortSignal;
}

interface Route {
  method: string;
  pattern: RegExp;
  handler: (ctx: RequestContext) => Promise<RouteResponse> | RouteResponse;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const MAX_BODY_BYTES = 64 * 1024;
const SESSION_HEADER = 'x-session-id';

// ---------------------------------------------------------------------------
// GatewayServer
// ---------------------------------------------------------------------------

export class GatewayServer {
  private server: Server | null = null;
  private readonly host: string;
  private readonly port: number;
  private readonly log: Logger;

  // Route table
  private readonly routes: Route[] = [];

  constructor(options: GatewayServerOptions) {
    this.host = options.host;
    this.port = options.port;
    this.log = options.logger ?? createLogger('@netlens/gateway');
    this.registerRoutes(options.routes);
  }

  /**
   * Start the HTTP server.
   */
  async start(): Promise<void> {
    const server = createServer((req, res) => {
      this.handleHttpRequest(req, res).catch((err: unknown) => {
        this.log.error({ error: describeError(err) }, 'Unhandled request failure');
        this.sendJson(res, 500, { error: 'Internal server error' });
      });
    });
    this.server = server;

    return new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.port, this.host, () => {
        this.log.info({ host: this.host, port: this.port }, 'Gateway listening');
        resolve();
      });
    });
  }

  /**
   * Stop the server gracefully.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    return new Promise<void>((resolve, reject) => {
      server.close((err) => {
        this.server = null;
        if (err) {
          reject(err);
          return;
        }
        this.log.info('Gateway stopped');
        resolve();
      });
    });
  }

  // -----------------------------------------------------------------------
  // HTTP Request Handler
  // -----------------------------------------------------------------------

  private async handleHttpRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const start = Date.now();
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');

    this.setCorsHeaders(res);

    // Handle preflight
    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const route = this.routes.find((r) => r.method === method && r.pattern.test(url.pathname));
    if (!route) {
      this.sendJson(res, 404, { error: 'Not found' });
      return;
    }

    // Client went away before we answered
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const { status, body } = await route.handler({ req, url, signal: controller.signal });
      this.sendJson(res, status, body);
    } catch (err) {
      this.log.error({ method, path: url.pathname, error: describeError(err) }, 'Route handler failed');
      this.sendJson(res, 500, { error: 'Internal server error' });
    }

    this.log.info(
      { method, path: url.pathname, status: res.statusCode, durationMs: Date.now() - start },
      'Request handled',
    );
  }

  // -----------------------------------------------------------------------
  // Routes
  // -----------------------------------------------------------------------

  private registerRoutes(routes: AssistantRoutes): void {
    this.addRoute('GET', /^\/health$/, () => routes.getHealth());

    this.addRoute('POST', /^\/api\/assistant$/, async ({ req, signal }) => {
      const body = await this.readBody(req);
      return routes.ask(body, headerValue(req, SESSION_HEADER), signal);
    });
    this.addRoute('GET', /^\/api\/assistant\/history$/, ({ req }) =>
      routes.getHistory(headerValue(req, SESSION_HEADER)),
    );

    this.addRoute('GET', /^\/api\/tool-guidance$/, ({ url }) =>
      routes.getToolGuidance(url.searchParams.get('tool')),
    );
  }

  private addRoute(method: string, pattern: RegExp, handler: Route['handler']): void {
    this.routes.push({ method, pattern, handler });
  }

  // -----------------------------------------------------------------------
  // Helpers
  // -----------------------------------------------------------------------

  private setCorsHeaders(res: ServerResponse): void {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', `Content-Type, ${SESSION_HEADER}`);
    res.setHeader('Access-Control-Max-Age', '86400');
  }

  /**
   * Send a JSON response.
   */
  private sendJson(res: ServerResponse, statusCode: number, data: unknown): void {
    if (res.headersSent || res.destroyed) return;

    const body = JSON.stringify(data);
    res.writeHead(statusCode, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(body),
    });
    res.end(body);
  }

  /**
   * Read and parse a JSON object body. Resolves null when the body is too
   * large, is not JSON, or is not an object; an empty body is `{}`.
   */
  private readBody(req: IncomingMessage): Promise<Record<string, unknown> | null> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let totalLength = 0;
      let tooLarge = false;

      req.on('data', (chunk: Buffer) => {
        totalLength += chunk.length;
        if (totalLength > MAX_BODY_BYTES) {
          tooLarge = true;
          return;
        }
        chunks.push(chunk);
      });

      req.on('end', () => {
        if (tooLarge) {
          resolve(null);
          return;
        }
        resolve(parseJsonObject(Buffer.concat(chunks).toString('utf-8')));
      });

      req.on('error', reject);
    });
  }
}

// ---------------------------------------------------------------------------
// Module helpers
// ---------------------------------------------------------------------------

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseJsonObject(text: string): Record<string, unknown> | null {
  if (!text.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
