/**
 * HTTP adapter for the controller routes (node:http, JSON in and out).
 */

import { createServer, type IncomingMessage, type ServerResponse } from 'http';
import type { AddressInfo } from 'net';
import { meshLog } from '../logger.js';
import { handleRoute, type ApiContext, type RouteResponse } from './router.js';

const MAX_BODY_BYTES = 64 * 1024;

class BodyError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

function readBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      // Past the cap the rest is drained and dropped, so the 413 reaches the client
      if (size > MAX_BODY_BYTES) {
        chunks = [];
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (size > MAX_BODY_BYTES) {
        reject(new BodyError(413, 'request body too large'));
        return;
      }
      const text = Buffer.concat(chunks).toString('utf8');
      if (text.trim() === '') {
        resolve(undefined);
        return;
      }
      try {
        resolve(JSON.parse(text));
      } catch {
        reject(new BodyError(400, 'invalid JSON'));
      }
    });
    req.on('error', reject);
  });
}

function send(res: ServerResponse, response: RouteResponse): void {
  res.writeHead(response.status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(response.body));
}

export class ControllerHttpServer {
  private ctx: ApiContext;
  private server: ReturnType<typeof createServer>;

  constructor(ctx: ApiContext) {
    this.ctx = ctx;
    this.server = createServer((req, res) => {
      void this.handle(req, res);
    });
  }

  async start(port: number): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, () => {
        this.server.off('error', reject);
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('server is not listening on a TCP port'));
          return;
        }
        resolve(address);
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close(err => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const url = req.url ?? '/';
    try {
      const body = method === 'POST' ? await readBody(req) : undefined;
      send(res, handleRoute(this.ctx, { method, url, body }));
    } catch (err) {
      if (err instanceof BodyError) {
        send(res, { status: err.status, body: { error: err.message } });
        return;
      }
      meshLog.error('api', 'Request failed', { method, url, error: String(err) });
      send(res, { status: 500, body: { error: 'internal error' } });
    }
  }
}
