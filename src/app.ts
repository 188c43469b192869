import Fastify, { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import Redis from 'ioredis';
import { v4 as uuidv4 } from 'uuid';
import { env } from './config/env';
import { logger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { ValidationError } from './sla/errors';
import { ComplianceOptions } from './sla/types';
import { SnapshotCorruptError, SnapshotNotFoundError, SnapshotStore } from './snapshot/types';
import { createSnapshotStore } from './snapshot/snapshot-store';
import { SnapshotManager } from './snapshot/snapshot-manager';
import { ReportService } from './reports/report-service';
import { registerReportRoutes } from './reports/report-routes';
import { registerUploadRoutes } from './upload/upload-routes';
import { registerHealthRoutes } from './health/health-routes';

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  store: SnapshotStore;
}

export interface BuildOptions {
  /** Use this store instead of building one from REDIS_URL */
  store?: SnapshotStore;
  compliance?: Partial<ComplianceOptions>;
}

async function connectRedis(url: string): Promise<Redis | undefined> {
  try {
    const redisInstance = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null; // stop retrying
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach error handler BEFORE connect to prevent unhandled error events
    redisInstance.on('error', (err: Error) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

export async function buildApp(options: BuildOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // We use our own Pino logger
    trustProxy: true,
    genReqId: () => uuidv4(),
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST'],
  });

  await app.register(multipart, {
    limits: {
      fileSize: env.upload.maxSizeMb * 1024 * 1024,
      files: 1,
    },
  });

  // Request timing middleware
  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? req.url;
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof ValidationError) {
      return reply.status(400).send(err.toJSON());
    }
    if (err instanceof SnapshotNotFoundError) {
      return reply.status(404).send({ error: 'snapshot_not_found', message: err.message });
    }
    if (err instanceof SnapshotCorruptError) {
      logger.error({ err, requestId: req.id }, 'Stored snapshot failed validation');
      return reply.status(500).send({ error: 'snapshot_corrupt' });
    }
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.code ?? 'bad_request', message: err.message });
    }
    logger.error({ err, requestId: req.id, url: req.url }, 'Unhandled request error');
    return reply.status(500).send({ error: 'internal_error' });
  });

  let redis: Redis | undefined;
  let store = options.store;
  if (!store) {
    redis = env.redis.url ? await connectRedis(env.redis.url) : undefined;
    store = createSnapshotStore(
      { keyPrefix: env.redis.keyPrefix, historyLimit: env.snapshots.historyLimit },
      redis,
    );
  }

  const compliance: ComplianceOptions = {
    terminalStatus: options.compliance?.terminalStatus ?? env.sla.terminalStatus,
  };
  logger.info({ terminalStatus: compliance.terminalStatus }, 'SLA eligibility configured');

  const snapshots = new SnapshotManager(store);
  const reports = new ReportService(store, compliance);

  registerHealthRoutes(app, store, redis ? 'redis' : 'memory');
  registerUploadRoutes(app, snapshots, compliance);
  registerReportRoutes(app, reports, store);

  return { app, redis, store };
}
