import { Registry, collectDefaultMetrics } from 'prom-client';
import type { Request, Response } from 'express';
import { logger, errorMessage } from '../observability/logger.js';

export interface RegistryOptions {
  /** Register Node.js process metrics alongside the tool's own. */
  collectDefaultMetrics?: boolean;
}

export function createRegistry(options: RegistryOptions = {}): Registry {
  const register = new Registry();

  if (options.collectDefaultMetrics) {
    collectDefaultMetrics({ register });
  }

  return register;
}

export function metricsHandler(register: Registry) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const body = await register.metrics();
      res.status(200).set('Content-Type', register.contentType).send(body);
    } catch (error) {
      logger.error('metrics_error', 'Failed to render metrics', {
        error: errorMessage(error),
      });
      res.status(500).json({ error: 'Failed to generate metrics' });
    }
  };
}
