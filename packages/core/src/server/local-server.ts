/**
 * Local HTTP server wrapper for Node.js
 *
 * Bridges Node.js `http.createServer` to `ConciergeServer.fetch(request)`.
 *
 * @internal
 */

import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ConciergeServer } from './concierge-server.js';

export interface LocalServerOptions {
  port?: number;
  host?: string;
}

export interface LocalServerHandle {
  port: number;
  close: () => Promise<void>;
}

/**
 * Start a local HTTP server that forwards requests to a ConciergeServer.
 *
 * @example
 * ```typescript
 * const handle = startLocalServer(server, { port: 3001 });
 * ```
 */
export function startLocalServer(
  server: ConciergeServer,
  options?: LocalServerOptions
): LocalServerHandle {
  const port = options?.port ?? 3001;
  const host = options?.host ?? '127.0.0.1';
  const logger = server.getLogger();

  const httpServer = createServer((req: IncomingMessage, res: ServerResponse) => {
    forward(server, req, res, port).catch((err: unknown) => {
      logger.error({ err }, 'Request error');
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'text/plain' });
      }
      res.end('Internal Server Error');
    });
  });

  httpServer.listen(port, host, () => {
    logger.info({ url: `http://${host}:${port}/` }, 'Local server running');
  });

  return {
    port,
    close: () =>
      new Promise<void>((done, fail) => {
        httpServer.close((err) => (err ? fail(err) : done()));
      }),
  };
}

async function forward(
  server: ConciergeServer,
  req: IncomingMessage,
  res: ServerResponse,
  port: number
): Promise<void> {
  const request = await nodeToWebRequest(req, port);
  const response = await server.fetch(request);
  await webToNodeResponse(response, res);
}

/**
 * Convert Node.js IncomingMessage to Web API Request.
 * The body is read as text; MCP requests are small JSON documents.
 */
async function nodeToWebRequest(req: IncomingMessage, port: number): Promise<Request> {
  const url = `http://localhost:${port}${req.url ?? '/'}`;
  const headers = new Headers();
  for (const [key, val] of Object.entries(req.headers)) {
    if (val) {
      headers.set(key, Array.isArray(val) ? val.join(', ') : val);
    }
  }

  const method = (req.method ?? 'GET').toUpperCase();
  const hasBody = method !== 'GET' && method !== 'HEAD';

  return new Request(url, {
    method,
    headers,
    body: hasBody ? await readBody(req) : undefined,
  });
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/**
 * Write a Web API Response to a Node.js ServerResponse.
 */
async function webToNodeResponse(response: Response, res: ServerResponse): Promise<void> {
  res.writeHead(response.status, Object.fromEntries(response.headers.entries()));
  if (response.body) {
    const reader = response.body.getReader();
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      res.write(value);
    }
  }
  res.end();
}

/**
 * Load environment variables from `.dev.vars` then `.env` files.
 * Later files do NOT override earlier ones (`.dev.vars` takes priority).
 * Missing files are skipped. Returns a flat record of key-value pairs.
 */
export function loadEnvFile(...paths: string[]): Record<string, string> {
  const defaultPaths = paths.length > 0 ? paths : ['.dev.vars', '.env'];
  const env: Record<string, string> = {};

  for (const p of defaultPaths) {
    const file = resolve(p);
    if (!existsSync(file)) continue;

    const content = readFileSync(file, 'utf-8');
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith('#')) continue;
      const eqIdx = trimmed.indexOf('=');
      if (eqIdx === -1) continue;
      const key = trimmed.slice(0, eqIdx).trim();
      let value = trimmed.slice(eqIdx + 1).trim();
      // Strip surrounding quotes
      if ((value.startsWith('"') && value.endsWith('"')) ||
          (value.startsWith("'") && value.endsWith("'"))) {
        value = value.slice(1, -1);
      }
      // First file wins
      if (!(key in env)) {
        env[key] = value;
      }
    }
  }

  return env;
}
