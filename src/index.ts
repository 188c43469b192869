import { buildApp } from './app';
import { env } from './config/env';
import { logger } from './observability/logger';

async function main(): Promise<void> {
  const { app, redis, store } = await buildApp();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down');
    // Let in-flight uploads finish their commit before the store goes away
    await app.close();
    redis?.disconnect();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  try {
    await app.listen({ port: env.port, host: '0.0.0.0' });
  } catch (err) {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  }

  const latest = await store.getLatest();
  logger.info(
    {
      port: env.port,
      env: env.nodeEnv,
      snapshotBackend: redis ? 'redis' : 'memory',
      snapshotId: latest?.id ?? null,
      tickets: latest?.tickets.length ?? 0,
      thresholds: latest?.thresholds.length ?? 0,
    },
    'SLA analytics service started',
  );
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
