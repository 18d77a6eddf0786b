/**
 * Lightweight health HTTP server for the scene connector container.
 * Uses node:http, no framework. Also accepts scene commands.
 */

import { createServer } from 'node:http';
import type { IncomingMessage, Server } from 'node:http';
import { createLogger } from '../logger.ts';
import type { SceneStatus } from '../scenes/scene-controller.ts';
import type { SceneCommandResult } from './scene-commands.ts';

export interface ConnectorHealthStatus {
  running: boolean;
  haConnected: boolean;
  scenes: SceneStatus[];
}

export interface HealthServerOptions {
  /** Handles the JSON body of `POST /command`; without it the route is a 404. */
  onCommand?: (body: string) => Promise<SceneCommandResult>;
}

const MAX_BODY_BYTES = 64 * 1024;

const log = createLogger('health');

class BodyTooLargeError extends Error {
  constructor() {
    super(`Request body exceeds ${MAX_BODY_BYTES} bytes`);
    this.name = 'BodyTooLargeError';
  }
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size <= MAX_BODY_BYTES) chunks.push(chunk);
    });
    req.on('end', () => {
      if (size > MAX_BODY_BYTES) reject(new BodyTooLargeError());
      else resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    req.on('error', reject);
  });
}

/**
 * Start a minimal HTTP health server.
 *
 * - GET /healthz: 200 if running and connected to Home Assistant, 503 otherwise (for Docker HEALTHCHECK)
 * - GET /health: detailed JSON status including per-scene state and settings
 * - POST /command: run a scene command, 200 on success, 400 otherwise
 */
export function startConnectorHealthServer(
  port: number,
  checks: () => Promise<ConnectorHealthStatus>,
  opts: HealthServerOptions = {},
): Server {
  const startTime = Date.now();

  const server = createServer((req, res) => {
    const respond = async (): Promise<void> => {
      if (req.method === 'GET' && req.url === '/healthz') {
        try {
          const status = await checks();
          const ok = status.running && status.haConnected;
          res.writeHead(ok ? 200 : 503, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ ok }));
        } catch (err) {
          log.warn('Health check failed', { error: err instanceof Error ? err.message : String(err) });
          res.writeHead(503, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ ok: false }));
        }
        return;
      }

      if (req.method === 'GET' && req.url === '/health') {
        try {
          const status = await checks();
          const ok = status.running && status.haConnected;
          const body = JSON.stringify({
            ok,
            uptime: Math.floor((Date.now() - startTime) / 1000),
            checks: status,
          });
          res.writeHead(ok ? 200 : 503, { 'Content-Type': 'application/json' });
          res.end(body);
        } catch (err) {
          res.writeHead(503, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ ok: false, error: err instanceof Error ? err.message : String(err) }));
        }
        return;
      }

      if (req.method === 'POST' && req.url === '/command' && opts.onCommand) {
        try {
          const result = await opts.onCommand(await readBody(req));
          res.writeHead(result.success ? 200 : 400, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify(result));
        } catch (err) {
          const tooLarge = err instanceof BodyTooLargeError;
          if (!tooLarge) {
            log.error('Command request failed', { error: err instanceof Error ? err.message : String(err) });
          }
          res.writeHead(tooLarge ? 413 : 500, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ success: false, error: err instanceof Error ? err.message : String(err) }));
        }
        return;
      }

      res.writeHead(404, { 'Content-Type': 'text/plain' });
      res.end('Not Found');
    };

    void respond();
  });

  server.listen(port, () => {
    const address = server.address();
    log.info('Health server listening', { port: typeof address === 'object' && address ? address.port : port });
  });

  return server;
}
