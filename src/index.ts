#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig } from './config/loader.js';
import { ConfigValidationError } from './config/errors.js';
import type { AppConfig } from './config/types.js';
import { run } from './app.js';
import { getVersion } from './version.js';
import { logger, errorMessage } from './observability/logger.js';

if (process.argv[2] === '--version') {
  console.log(`tct ${getVersion()}`);
  process.exit(0);
}

dotenv.config();

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (error) {
  const reason = error instanceof ConfigValidationError
    ? `failed to parse configuration: ${error.message}`
    : errorMessage(error);
  console.error(`initialization failed: ${reason}`);
  process.exit(1);
}

const version = getVersion();
logger.setLevel(config.logLevel);
logger.setContext({ mode: config.mode, version });
logger.info('startup', 'Starting tct', { version, mode: config.mode });

const shutdown = new AbortController();

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logger.info('shutdown', `${signal} received, graceful shutdown`);
    shutdown.abort();
  });
}

run(config, shutdown.signal)
  .then(() => {
    logger.info('shutdown', 'Shutdown complete');
    process.exit(0);
  })
  .catch((error: unknown) => {
    logger.error('runtime_error', 'Runtime error', { error: errorMessage(error) });
    process.exit(1);
  });
