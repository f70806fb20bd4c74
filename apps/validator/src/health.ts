import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Logger } from 'pino';
import type { AccessToken } from './auth/token-cache.js';
import type { Config } from './config.js';
import type { ValidationStore } from './data/store.js';
import type { PollerStatus } from './poller.js';
import type { HealthStatus } from './types.js';

/** Consecutive failed cycles after which the poller reports unhealthy */
export const MAX_CONSECUTIVE_FAILURES = 5;

export interface HealthDeps {
  store: Pick<ValidationStore, 'ping'>;
  poller: { getStatus(): PollerStatus };
  tokenCache: { peek(): AccessToken | null };
}

/**
 * HTTP health check server for container liveness probes
 */
export class HealthServer {
  private server: Server | null = null;
  private isShuttingDown = false;
  private readonly logger: Logger;

  constructor(
    private readonly config: Pick<Config, 'healthPort' | 'memoryThresholdMb'>,
    private readonly deps: HealthDeps,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'HealthServer' });
  }

  /**
   * Start the health check server
   */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          this.logger.error({ error }, 'Health request failed');
          if (!res.headersSent) {
            res.writeHead(500, { 'Content-Type': 'application/json' });
          }
          res.end(JSON.stringify({ error: 'Internal error' }));
        });
      });

      this.server.on('error', (err) => {
        this.logger.error({ error: err.message }, 'Health server error');
        reject(err);
      });

      this.server.listen(this.config.healthPort, () => {
        this.logger.info({ port: this.address() }, 'Health server started');
        resolve();
      });
    });
  }

  /**
   * Stop the health check server
   */
  async stop(): Promise<void> {
    this.isShuttingDown = true;
    return new Promise((resolve) => {
      if (!this.server) {
        resolve();
        return;
      }

      this.server.close(() => {
        this.logger.info('Health server stopped');
        resolve();
      });
    });
  }

  /** Bound port; differs from config when started on port 0 */
  address(): number | null {
    const addr = this.server?.address();
    return addr && typeof addr === 'object' ? addr.port : null;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    // Only handle GET /health
    if (req.method !== 'GET' || (req.url !== '/health' && req.url !== '/')) {
      res.writeHead(404, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Not found' }));
      return;
    }

    const status = await this.getHealthStatus();
    const httpStatus = status.status === 'healthy' ? 200 : 503;

    res.writeHead(httpStatus, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(status));
  }

  /**
   * Get current health status
   */
  async getHealthStatus(): Promise<HealthStatus> {
    const memoryUsage = process.memoryUsage();
    const heapUsedMb = memoryUsage.heapUsed / 1024 / 1024;
    const memoryBelowThreshold = heapUsedMb < this.config.memoryThresholdMb;

    let databaseConnected = true;
    try {
      await this.deps.store.ping();
    } catch (error) {
      databaseConnected = false;
      this.logger.warn({ error }, 'Database ping failed');
    }

    const pollerStatus = this.deps.poller.getStatus();
    const pollerHealthy = pollerStatus.running && pollerStatus.consecutiveFailures < MAX_CONSECUTIVE_FAILURES;
    const token = this.deps.tokenCache.peek();

    const isHealthy = !this.isShuttingDown && databaseConnected && pollerHealthy && memoryBelowThreshold;

    return {
      status: isHealthy ? 'healthy' : 'unhealthy',
      timestamp: Date.now(),
      checks: {
        database: {
          connected: databaseConnected,
        },
        poller: {
          running: pollerStatus.running,
          lastCycleAt: pollerStatus.lastCycleAt,
          consecutiveFailures: pollerStatus.consecutiveFailures,
        },
        token: {
          cached: token !== null,
          expiresAt: token ? token.expiresAt.getTime() : null,
        },
        memory: {
          heapUsed: Math.round(heapUsedMb * 100) / 100,
          heapTotal: Math.round((memoryUsage.heapTotal / 1024 / 1024) * 100) / 100,
          rss: Math.round((memoryUsage.rss / 1024 / 1024) * 100) / 100,
          belowThreshold: memoryBelowThreshold,
        },
      },
    };
  }
}
