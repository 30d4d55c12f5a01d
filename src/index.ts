#!/usr/bin/env node
import 'dotenv/config';
import { Server } from 'node:http';
import path from 'node:path';
import { serve } from '@hono/node-server';
import { Command } from 'commander';
import { createApp } from './app';
import { CacheManager } from './cache';
import { loadConfig, ProxyConfig, ServerConfig } from './config';
import { ConfigError, describeError } from './errors';
import { createLogger, Logger } from './logger';
import { MetricsCollector } from './metrics';
import { createRedisStore } from './store';

function applyServerTimeouts(server: unknown, config: ServerConfig): void {
  if (!(server instanceof Server)) return;
  server.requestTimeout = config.readTimeoutMs;
  server.headersTimeout = config.readTimeoutMs;
  server.keepAliveTimeout = config.idleTimeoutMs;
  server.setTimeout(config.writeTimeoutMs);
}

async function start(config: ProxyConfig, logger: Logger): Promise<void> {
  const store = await createRedisStore(config.valkey, logger);

  const metrics = new MetricsCollector();
  const cache = new CacheManager(store, logger, config.cache.defaultTtlMs, metrics);
  const app = createApp({ config, cache, logger, metrics });

  const server = serve({ fetch: app.fetch, hostname: config.server.host, port: config.server.port }, info => {
    logger.info('Server listening', {
      address: `${info.address}:${info.port}`,
      upstream: config.upstream.baseUrl,
      rate_limit: config.rateLimit.enabled,
      retry: config.retry.enabled
    });
  });
  applyServerTimeouts(server, config.server);

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down server', { signal });

    server.close(error => {
      if (error) {
        logger.error('Server forced to shutdown', { error });
      }
      store
        .close()
        .then(() => {
          logger.info('Server exited');
          process.exit(error ? 1 : 0);
        })
        .catch((closeError: unknown) => {
          logger.error('Failed to close Valkey connection', { error: closeError });
          process.exit(1);
        });
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

const program = new Command();

program
  .name('api-cache')
  .description('Caching reverse proxy backed by Valkey')
  .version('1.0.0')
  .option('-c, --config <path>', 'Path to config YAML', 'config.yaml')
  .action(async (options: { config: string }) => {
    let config: ProxyConfig;
    try {
      config = loadConfig(path.resolve(options.config));
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error(`Failed to load configuration: ${error.message}`);
        process.exit(1);
      }
      throw error;
    }

    let logger: Logger;
    try {
      logger = createLogger(config.logging);
    } catch (error) {
      console.error(`Failed to open log output: ${describeError(error)}`);
      process.exit(1);
    }
    logger.info('Starting API Cache Proxy', { config: options.config });

    try {
      await start(config, logger);
    } catch (error) {
      logger.error('Failed to start server', { error: describeError(error) });
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Fatal Error:', describeError(error));
  process.exit(1);
});
