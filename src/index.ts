import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';

const PREFETCH_DRAIN_TIMEOUT_MS = 10_000;

async function main(): Promise<void> {
  const { app, redis, prefetcher } = await buildApp();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    if (prefetcher.isRunning()) {
      const drained = await prefetcher.drain(PREFETCH_DRAIN_TIMEOUT_MS);
      logger.info({ drained }, 'Prefetch drained');
    }
    await app.close();
    if (redis) {
      redis.disconnect();
    }
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.fatal({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  // Start server
  try {
    await app.listen({ port: env.port, host: '0.0.0.0' });
    logger.info({ port: env.port, env: env.nodeEnv, upstream: env.upstream.baseUrl }, 'SRD navigator started');
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
