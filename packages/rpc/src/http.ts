/**
 * @fileoverview HTTP binding
 *
 * Thin node:http adapter around an RpcService: POST / with a JSON body.
 * Status mapping:
 * - 200: any JSON-RPC response, including JSON-RPC errors
 * - 204: notification-only submission
 * - 400: body is not JSON, or not an object or array
 * - 404 / 405: wrong path / wrong method
 * - 413: body over the configured limit
 */

import * as http from 'http';
import type { AddressInfo } from 'net';
import { createLogger, getSettings, type HttpSettings, type ISwitchyardLogger } from '@switchyard/core';
import type { RpcService } from './service.js';

export interface RpcHttpServerOptions extends Partial<HttpSettings> {
  /** Per-handler timeout applied to every call */
  timeoutMs?: number;
  logger?: ISwitchyardLogger;
}

class PayloadTooLargeError extends Error {
  override readonly name = 'PayloadTooLargeError';
}

export class RpcHttpServer<C> {
  private readonly config: HttpSettings;
  private readonly timeoutMs: number | undefined;
  private readonly logger: ISwitchyardLogger;
  private server: http.Server | null = null;

  constructor(
    private readonly service: RpcService<C>,
    options: RpcHttpServerOptions = {}
  ) {
    const { timeoutMs, logger, ...overrides } = options;
    this.config = { ...getSettings().http, ...overrides };
    this.timeoutMs = timeoutMs;
    this.logger = logger ?? createLogger('rpc-http');
  }

  /**
   * Start listening
   */
  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        this.logger.error('HTTP request handling failed', error instanceof Error ? error : { error: String(error) });
        if (!res.headersSent) {
          res.writeHead(500);
        }
        res.end();
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    server.on('error', (error) => {
      this.logger.error('HTTP server error', error);
    });
    this.server = server;
    this.logger.info('HTTP server listening', { host: this.config.host, port: this.address()?.port });
  }

  /**
   * Stop accepting connections and wait for open ones to finish
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  /**
   * Bound address, or null when not listening
   */
  address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private setCorsHeaders(res: http.ServerResponse): void {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    if (this.config.cors) {
      this.setCorsHeaders(res);
    }

    const url = new URL(req.url ?? '/', 'http://localhost');
    if (url.pathname !== '/') {
      res.writeHead(404, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Not found' }));
      return;
    }

    if (req.method === 'OPTIONS' && this.config.cors) {
      res.writeHead(204);
      res.end();
      return;
    }

    if (req.method !== 'POST') {
      res.writeHead(405, { Allow: 'POST', 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Method not allowed' }));
      return;
    }

    let body: Buffer;
    try {
      body = await this.readBody(req);
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        res.writeHead(413, { 'Content-Type': 'application/json', Connection: 'close' });
        res.end(JSON.stringify({ error: 'Payload too large' }));
        return;
      }
      throw error;
    }

    const result = await this.service.process(body, { timeoutMs: this.timeoutMs });

    if (result.body === null) {
      res.writeHead(204);
      res.end();
      return;
    }

    res.writeHead(result.malformed ? 400 : 200, { 'Content-Type': 'application/json' });
    res.end(result.body);
  }

  private readBody(req: http.IncomingMessage): Promise<Buffer> {
    const limit = this.config.maxBodyBytes;

    return new Promise<Buffer>((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let rejected = false;

      req.on('data', (chunk: Buffer) => {
        if (rejected) return;
        size += chunk.length;
        if (size > limit) {
          rejected = true;
          // stop buffering, drain the rest so the response can be written
          chunks.length = 0;
          req.resume();
          reject(new PayloadTooLargeError(`Body exceeds ${limit} bytes`));
          return;
        }
        chunks.push(chunk);
      });
      req.on('end', () => {
        if (!rejected) resolve(Buffer.concat(chunks));
      });
      req.on('error', reject);
    });
  }
}
