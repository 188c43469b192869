/**
 * Snapshot Manager
 *
 * Builds the next snapshot from the latest one plus a freshly uploaded table
 * and commits it. Replacements run one at a time so that two concurrent
 * uploads cannot both start from the same predecessor and drop a table.
 */

import { v4 as uuidv4 } from 'uuid';
import { SLAThreshold, Ticket } from '../sla/types';
import { DataSnapshot, SnapshotStore } from './types';
import { logger } from '../observability/logger';

export class SnapshotManager {
  private readonly log = logger.child({ component: 'snapshot-manager' });
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: SnapshotStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  replaceTickets(tickets: readonly Ticket[]): Promise<DataSnapshot> {
    return this.enqueue((prev, at) => ({
      tickets,
      ticketsUploadedAt: at,
      thresholds: prev?.thresholds ?? [],
      thresholdsUploadedAt: prev?.thresholdsUploadedAt ?? null,
    }));
  }

  replaceThresholds(thresholds: readonly SLAThreshold[]): Promise<DataSnapshot> {
    return this.enqueue((prev, at) => ({
      tickets: prev?.tickets ?? [],
      ticketsUploadedAt: prev?.ticketsUploadedAt ?? null,
      thresholds,
      thresholdsUploadedAt: at,
    }));
  }

  private enqueue(
    build: (prev: DataSnapshot | null, at: Date) => Omit<DataSnapshot, 'id' | 'createdAt'>,
  ): Promise<DataSnapshot> {
    const run = async (): Promise<DataSnapshot> => {
      const prev = await this.store.getLatest();
      const at = this.now();
      const next: DataSnapshot = { id: uuidv4(), createdAt: at, ...build(prev, at) };
      await this.store.commit(next);
      this.log.info(
        { snapshotId: next.id, previous: prev?.id ?? null, tickets: next.tickets.length, thresholds: next.thresholds.length },
        'Dataset snapshot replaced',
      );
      return next;
    };

    const result = this.queue.then(run, run);
    // Keep the chain alive after a failed commit; the caller still sees the rejection
    this.queue = result.catch(() => undefined);
    return result;
  }
}
