/**
 * Snapshot Store
 *
 * Redis + InMemory fallback for dataset snapshots. Both publish a new snapshot
 * with a single pointer swap, so readers see either the old pair of tables or
 * the new one, never a mix.
 */

import { DataSnapshot, SnapshotInfo, SnapshotStore, describeSnapshot } from './types';
import { decodeSnapshot, encodeSnapshot } from './snapshot-codec';
import { logger } from '../observability/logger';

// ───── Redis Implementation ─────────────────────────────────────

/** The slice of the ioredis client the store uses */
export interface SnapshotRedisClient {
  get(key: string): Promise<string | null>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  ping(): Promise<string>;
  multi(): SnapshotRedisTransaction;
}

export interface SnapshotRedisTransaction {
  set(key: string, value: string): SnapshotRedisTransaction;
  lpush(key: string, value: string): SnapshotRedisTransaction;
  ltrim(key: string, start: number, stop: number): SnapshotRedisTransaction;
  del(key: string): SnapshotRedisTransaction;
  exec(): Promise<unknown>;
}

export class RedisSnapshotStore implements SnapshotStore {
  private readonly log = logger.child({ component: 'snapshot-redis' });

  constructor(
    private readonly redis: SnapshotRedisClient,
    private readonly keyPrefix: string,
    private readonly historyLimit: number,
  ) {}

  private docKey(id: string): string {
    return `${this.keyPrefix}snapshot:${id}`;
  }

  private get latestKey(): string {
    return `${this.keyPrefix}snapshot:latest`;
  }

  private get historyKey(): string {
    return `${this.keyPrefix}snapshot:history`;
  }

  async getLatest(): Promise<DataSnapshot | null> {
    const id = await this.redis.get(this.latestKey);
    return id ? this.get(id) : null;
  }

  async get(id: string): Promise<DataSnapshot | null> {
    const raw = await this.redis.get(this.docKey(id));
    return raw ? decodeSnapshot(id, raw) : null;
  }

  async list(limit: number): Promise<SnapshotInfo[]> {
    const ids = await this.redis.lrange(this.historyKey, 0, Math.max(0, limit - 1));
    const infos: SnapshotInfo[] = [];
    for (const id of ids) {
      const s = await this.get(id);
      if (s) infos.push(describeSnapshot(s));
    }
    return infos;
  }

  async commit(snapshot: DataSnapshot): Promise<void> {
    const evicted = await this.redis.lrange(this.historyKey, this.historyLimit - 1, -1);

    const tx = this.redis
      .multi()
      .set(this.docKey(snapshot.id), encodeSnapshot(snapshot))
      .set(this.latestKey, snapshot.id)
      .lpush(this.historyKey, snapshot.id)
      .ltrim(this.historyKey, 0, this.historyLimit - 1);
    for (const id of evicted) {
      tx.del(this.docKey(id));
    }
    await tx.exec();

    this.log.info({ snapshotId: snapshot.id, evicted: evicted.length }, 'Snapshot committed');
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch (err) {
      this.log.warn({ err }, 'Redis ping failed');
      return false;
    }
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemorySnapshotStore implements SnapshotStore {
  /** Newest first; index 0 is the latest snapshot */
  private history: readonly DataSnapshot[] = [];

  constructor(private readonly historyLimit: number) {}

  async getLatest(): Promise<DataSnapshot | null> {
    return this.history[0] ?? null;
  }

  async get(id: string): Promise<DataSnapshot | null> {
    return this.history.find((s) => s.id === id) ?? null;
  }

  async list(limit: number): Promise<SnapshotInfo[]> {
    return this.history.slice(0, limit).map(describeSnapshot);
  }

  async commit(snapshot: DataSnapshot): Promise<void> {
    this.history = [snapshot, ...this.history].slice(0, this.historyLimit);
  }

  async ping(): Promise<boolean> {
    return true;
  }
}

// ───── Factory ──────────────────────────────────────────────────

export interface SnapshotStoreOptions {
  keyPrefix: string;
  historyLimit: number;
}

export function createSnapshotStore(options: SnapshotStoreOptions, redis?: SnapshotRedisClient): SnapshotStore {
  const historyLimit = Math.max(1, options.historyLimit);
  if (redis) {
    logger.info('Snapshot store: Redis-backed');
    return new RedisSnapshotStore(redis, options.keyPrefix, historyLimit);
  }
  logger.info('Snapshot store: In-memory');
  return new InMemorySnapshotStore(historyLimit);
}
