/**
 * Dataset Snapshot Types
 *
 * A snapshot is the immutable pair of ticket table and threshold matrix that
 * every report is computed from. Uploads never mutate a snapshot; they commit
 * a new one.
 */

import { SLAThreshold, Ticket } from '../sla/types';

export interface DataSnapshot {
  readonly id: string;
  readonly createdAt: Date;
  readonly tickets: readonly Ticket[];
  readonly thresholds: readonly SLAThreshold[];
  readonly ticketsUploadedAt: Date | null;
  readonly thresholdsUploadedAt: Date | null;
}

export interface SnapshotInfo {
  id: string;
  createdAt: Date;
  tickets: number;
  thresholds: number;
  ticketsUploadedAt: Date | null;
  thresholdsUploadedAt: Date | null;
}

export interface SnapshotStore {
  getLatest(): Promise<DataSnapshot | null>;
  get(id: string): Promise<DataSnapshot | null>;
  /** Newest first */
  list(limit: number): Promise<SnapshotInfo[]>;
  /** Publish a snapshot as the new latest in one step */
  commit(snapshot: DataSnapshot): Promise<void>;
  /** True when the backing store answers */
  ping(): Promise<boolean>;
}

export class SnapshotNotFoundError extends Error {
  constructor(readonly snapshotId: string) {
    super(`Snapshot not found: ${snapshotId}`);
    this.name = 'SnapshotNotFoundError';
  }
}

export class SnapshotCorruptError extends Error {
  constructor(readonly snapshotId: string, detail: string) {
    super(`Stored snapshot ${snapshotId} is invalid: ${detail}`);
    this.name = 'SnapshotCorruptError';
  }
}

export function describeSnapshot(s: DataSnapshot): SnapshotInfo {
  return {
    id: s.id,
    createdAt: s.createdAt,
    tickets: s.tickets.length,
    thresholds: s.thresholds.length,
    ticketsUploadedAt: s.ticketsUploadedAt,
    thresholdsUploadedAt: s.thresholdsUploadedAt,
  };
}
