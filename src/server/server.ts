import express, { Express, RequestHandler } from 'express';
import type { Server as HttpServer } from 'http';
import type { Registry } from 'prom-client';
import { healthz, readyz } from '../handlers/health.js';
import { metricsHandler } from '../metrics/registry.js';
import { logger, errorMessage } from '../observability/logger.js';

export interface ServerOptions {
  port: number;
  /** How long open connections may drain after shutdown before being destroyed. */
  shutdownGraceMs: number;
  host?: string;
}

export class Server {
  readonly app: Express;
  private http: HttpServer | null = null;
  private ready = false;

  constructor(private readonly options: ServerOptions) {
    this.app = express();
    this.app.disable('x-powered-by');
  }

  registerCommonRoutes(register: Registry): void {
    this.app.get('/metrics', metricsHandler(register));
    this.app.get('/healthz', healthz);
    this.app.get('/readyz', readyz(() => this.ready));
  }

  registerHandler(method: 'get' | 'post', path: string, handler: RequestHandler): void {
    if (method === 'get') {
      this.app.get(path, handler);
    } else {
      this.app.post(path, handler);
    }
  }

  isReady(): boolean {
    return this.ready;
  }

  /** Bound port once listening; differs from the configured one when that was 0. */
  getPort(): number | null {
    const address = this.http?.address();
    if (!address || typeof address === 'string') return null;
    return address.port;
  }

  /**
   * Starts listening and resolves once the server has shut down after
   * `signal` aborted. Rejects when the listener fails (for example when
   * the port is taken).
   */
  start(signal: AbortSignal, onListening?: () => void): Promise<void> {
    return new Promise((resolve, reject) => {
      const http = this.options.host
        ? this.app.listen(this.options.port, this.options.host)
        : this.app.listen(this.options.port);
      this.http = http;

      const shutdown = () => {
        this.ready = false;
        logger.info('server_shutdown', 'Shutting down server', {
          graceMs: this.options.shutdownGraceMs,
        });

        const forceClose = setTimeout(() => {
          logger.warn('server_shutdown', 'Grace period elapsed, closing remaining connections');
          http.closeAllConnections();
        }, this.options.shutdownGraceMs);

        http.close((error) => {
          clearTimeout(forceClose);
          if (error) {
            logger.error('server_shutdown', 'Server shutdown error', { error: errorMessage(error) });
          }
          resolve();
        });
        http.closeIdleConnections();
      };

      http.once('listening', () => {
        this.ready = true;
        logger.info('server_started', 'Server listening', { port: this.getPort() });
        onListening?.();

        if (signal.aborted) {
          shutdown();
        } else {
          signal.addEventListener('abort', shutdown, { once: true });
        }
      });

      http.once('error', (error) => {
        signal.removeEventListener('abort', shutdown);
        this.ready = false;
        reject(new Error(`server error: ${errorMessage(error)}`));
      });
    });
  }
}
