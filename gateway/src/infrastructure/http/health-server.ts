import type { Server } from 'node:http';
import express, { type Express, type Request, type Response } from 'express';
import type { Registry } from 'prom-client';
import { logger, type HealthChecker, type HealthStatus } from '@tenantune/logger';
import { describeError } from '@tenantune/audio';

export class HealthServer {
  readonly app: Express;
  private server: Server | null = null;

  constructor(
    private readonly healthChecker: Pick<HealthChecker, 'check'>,
    private readonly metricsRegistry: Registry,
    private readonly port: number = 8080,
  ) {
    this.app = express();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get('/health', async (_req: Request, res: Response) => {
      try {
        const health = await this.healthChecker.check();
        res.status(httpStatusFor(health.status)).json(health);
      } catch (error) {
        logger.error({ error: describeError(error) }, 'Health check failed');
        res.status(500).json({ status: 'unhealthy', error: 'Health check failed' });
      }
    });

    // Liveness only, no dependency checks
    this.app.get('/live', (_req: Request, res: Response) => {
      res.status(200).json({ status: 'alive', timestamp: new Date().toISOString() });
    });

    // Prometheus scrape endpoint
    this.app.get('/metrics', async (_req: Request, res: Response) => {
      try {
        const body = await this.metricsRegistry.metrics();
        res.set('Content-Type', this.metricsRegistry.contentType);
        res.status(200).send(body);
      } catch (error) {
        logger.error({ error: describeError(error) }, 'Metrics export failed');
        res.status(500).send('# Metrics export failed\n');
      }
    });
  }

  /**
   * Starts listening; resolves with the bound port (useful with port 0).
   */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port);
      server.once('listening', () => {
        const address = server.address();
        const port = address && typeof address === 'object' ? address.port : this.port;
        logger.info({ port }, 'Health server started');
        resolve(port);
      });
      server.once('error', (error: Error) => {
        logger.error({ error: describeError(error) }, 'Health server error');
        reject(error);
      });
      this.server = server;
    });
  }

  async shutdown(): Promise<void> {
    const { server } = this;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('Health server shut down');
  }
}

function httpStatusFor(status: HealthStatus): number {
  // Degraded still serves traffic
  return status === 'unhealthy' ? 503 : 200;
}
