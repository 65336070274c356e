import http from 'node:http';
import { Hono } from 'hono';
import { createLogger } from '../utils/logger.js';
import { HealthStatus, type HealthSource } from '../core/types/gateway.js';

const logger = createLogger('HealthServer');

export interface HealthServerOptions {
  host: string;
  port: number;
}

/**
 * Liveness endpoint polled by an external scheduler to keep the process warm.
 *
 * GET /health answers 200 {"status":"OK"} while the gateway is up or still
 * reconnecting, and 503 {"status":"DEGRADED"} once it has given up.
 */
export class HealthServer {
  private app: Hono;
  private server: http.Server | null = null;

  constructor(private source: HealthSource) {
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get('/health', (c) => {
      const status = this.source.getHealth();
      return c.json({ status }, status === HealthStatus.OK ? 200 : 503);
    });

    this.app.notFound((c) => c.json({ error: 'Not Found' }, 404));
  }

  // Listens in the background; resolves once the port is bound
  async start(options: HealthServerOptions): Promise<void> {
    const { host, port } = options;

    const server = http.createServer((req, res) => {
      this.handle(req, res, host, port).catch((error: unknown) => {
        logger.error('Health request failed', { error: String(error) });
        if (!res.headersSent) {
          res.statusCode = 500;
        }
        res.end();
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;
    logger.info(`Health endpoint listening on http://${host}:${this.getPort() ?? port}/health`);
  }

  private async handle(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    host: string,
    port: number
  ): Promise<void> {
    const url = new URL(req.url || '/', `http://${host}:${port}`);
    const request = new Request(url.toString(), { method: req.method || 'GET' });

    const response = await this.app.fetch(request);

    res.statusCode = response.status;
    for (const [key, value] of response.headers.entries()) {
      res.setHeader(key, value);
    }
    res.end(await response.text());
  }

  getPort(): number | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('Health endpoint stopped');
  }

  getApp(): Hono {
    return this.app;
  }
}

export default HealthServer;
