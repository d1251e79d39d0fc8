#!/usr/bin/env node
/**
 * InsightFlow service entry point.
 *
 * Loads configuration, opens the store, wires services and serves the HTTP
 * API until SIGINT/SIGTERM.
 *
 * Run: node dist/main.js
 */

// Load environment before any module reads process.env
import 'dotenv/config';

import { serve } from '@hono/node-server';
import { loadConfig } from './config/index.js';
import { formatErrorForLog } from './errors/index.js';
import { createApp } from './server/app.js';
import { createServices, type Services } from './services.js';
import { ConsoleSink, FileSink, configureLogger, createComponentLogger, type LogSink } from './integrations/utilities/logger.js';

const log = createComponentLogger('Main');

const SHUTDOWN_TIMEOUT_MS = 10_000;

let services: Services | undefined;
let server: ReturnType<typeof serve> | undefined;
let isCleaningUp = false;

async function gracefulCleanup(reason: string): Promise<void> {
  if (isCleaningUp) return;
  isCleaningUp = true;

  log.info('Shutting down', { reason });

  const forceExitTimeout = setTimeout(() => {
    log.error('Shutdown timed out, forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExitTimeout.unref();

  try {
    // Stop accepting connections first, then drain runs and close the store
    if (server) {
      const closing = server;
      await new Promise<void>((resolve) => closing.close(() => resolve()));
    }
    if (services) {
      await services.close();
    }
  } catch (error) {
    log.error('Cleanup error', { error: formatErrorForLog(error) });
  } finally {
    clearTimeout(forceExitTimeout);
  }
}

process.on('unhandledRejection', (reason) => {
  log.error('Unhandled promise rejection', { error: formatErrorForLog(reason) });
  void gracefulCleanup('unhandled rejection').then(() => process.exit(1));
});

process.on('uncaughtException', (error, origin) => {
  log.error('Uncaught exception', { origin, error: formatErrorForLog(error) });
  void gracefulCleanup('uncaught exception').then(() => process.exit(1));
});

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    void gracefulCleanup(signal).then(() => process.exit(0));
  });
}

function main(): void {
  const { config, warnings, sources } = loadConfig();

  const sinks: LogSink[] = [new ConsoleSink(config.logging.format)];
  if (config.logging.file) {
    sinks.push(new FileSink(config.logging.file));
  }
  configureLogger({ level: config.logging.level, sinks });

  for (const warning of warnings) {
    log.warn(warning);
  }
  log.debug('Configuration loaded', { sources: sources.filter((s) => s.loaded).map((s) => s.path) });

  services = createServices(config);
  const app = createApp(services);

  server = serve({ fetch: app.fetch, port: config.server.port, hostname: config.server.hostname }, (info) => {
    log.info('API server listening', { url: `http://${info.address}:${info.port}` });
  });
}

main();
