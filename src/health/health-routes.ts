import { FastifyInstance } from 'fastify';
import { env } from '../config/env';
import { getMetrics, getContentType } from '../observability/metrics';
import { SnapshotStore } from '../snapshot/types';

export function registerHealthRoutes(app: FastifyInstance, store: SnapshotStore, backend: 'redis' | 'memory'): void {
  /** Liveness probe — always returns 200 if the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness probe — snapshot store reachable; reports whether data is loaded */
  app.get('/ready', async (_req, reply) => {
    const start = Date.now();
    const storeOk = await store.ping();
    const latest = storeOk ? await store.getLatest() : null;

    return reply.status(storeOk ? 200 : 503).send({
      status: storeOk ? 'ready' : 'not_ready',
      checks: {
        snapshotStore: { status: storeOk ? 'ok' : 'error', backend, latencyMs: Date.now() - start },
      },
      data: {
        snapshotId: latest?.id ?? null,
        tickets: latest?.tickets.length ?? 0,
        thresholds: latest?.thresholds.length ?? 0,
      },
      timestamp: new Date().toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  if (env.observability.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
