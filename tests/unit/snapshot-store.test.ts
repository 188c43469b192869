import { InMemorySnapshotStore } from '../../src/snapshot/snapshot-store';
import { SnapshotManager } from '../../src/snapshot/snapshot-manager';
import { DataSnapshot, SnapshotStore } from '../../src/snapshot/types';
import { at, makeThreshold, makeTicket } from '../helpers/tickets';

function snapshot(id: string, minutes: number): DataSnapshot {
  return {
    id,
    createdAt: at(minutes),
    tickets: [makeTicket()],
    thresholds: [],
    ticketsUploadedAt: at(minutes),
    thresholdsUploadedAt: null,
  };
}

describe('InMemorySnapshotStore', () => {
  it('should start empty', async () => {
    const store = new InMemorySnapshotStore(3);
    expect(await store.getLatest()).toBeNull();
    expect(await store.list(10)).toEqual([]);
    expect(await store.ping()).toBe(true);
  });

  it('should make the last commit the latest and keep earlier ones addressable', async () => {
    const store = new InMemorySnapshotStore(3);
    await store.commit(snapshot('a', 0));
    await store.commit(snapshot('b', 1));

    expect((await store.getLatest())?.id).toBe('b');
    expect((await store.get('a'))?.id).toBe('a');
    expect(await store.get('missing')).toBeNull();
  });

  it('should list newest first and evict beyond the history limit', async () => {
    const store = new InMemorySnapshotStore(2);
    await store.commit(snapshot('a', 0));
    await store.commit(snapshot('b', 1));
    await store.commit(snapshot('c', 2));

    const list = await store.list(10);
    expect(list.map((s) => s.id)).toEqual(['c', 'b']);
    expect(list[0]).toEqual({
      id: 'c',
      createdAt: at(2),
      tickets: 1,
      thresholds: 0,
      ticketsUploadedAt: at(2),
      thresholdsUploadedAt: null,
    });
    expect(await store.get('a')).toBeNull();
    expect(await store.list(1)).toHaveLength(1);
  });
});

describe('SnapshotManager', () => {
  it('should carry the other table over when one is replaced', async () => {
    const store = new InMemorySnapshotStore(5);
    let minute = 0;
    const manager = new SnapshotManager(store, () => at(minute++));

    const first = await manager.replaceThresholds([makeThreshold()]);
    const second = await manager.replaceTickets([makeTicket({ issueKey: 'SUP-9' })]);

    expect(first.tickets).toEqual([]);
    expect(first.ticketsUploadedAt).toBeNull();
    expect(second.thresholds).toBe(first.thresholds);
    expect(second.thresholdsUploadedAt).toEqual(at(0));
    expect(second.ticketsUploadedAt).toEqual(at(1));
    expect(second.tickets.map((t) => t.issueKey)).toEqual(['SUP-9']);
    expect(second.id).not.toBe(first.id);
    expect((await store.getLatest())?.id).toBe(second.id);
  });

  it('should leave earlier snapshots untouched', async () => {
    const store = new InMemorySnapshotStore(5);
    const manager = new SnapshotManager(store);

    const first = await manager.replaceTickets([makeTicket({ issueKey: 'OLD' })]);
    await manager.replaceTickets([makeTicket({ issueKey: 'NEW' })]);

    const reread = await store.get(first.id);
    expect(reread?.tickets.map((t) => t.issueKey)).toEqual(['OLD']);
  });

  it('should not lose a table when uploads race', async () => {
    const store = new InMemorySnapshotStore(5);
    const manager = new SnapshotManager(store);

    await Promise.all([
      manager.replaceTickets([makeTicket()]),
      manager.replaceThresholds([makeThreshold()]),
    ]);

    const latest = await store.getLatest();
    expect(latest?.tickets).toHaveLength(1);
    expect(latest?.thresholds).toHaveLength(1);
    expect(await store.list(10)).toHaveLength(2);
  });

  it('should keep the current snapshot when a commit fails and accept the next upload', async () => {
    const inner = new InMemorySnapshotStore(5);
    let failNext = false;
    const flaky: SnapshotStore = {
      getLatest: () => inner.getLatest(),
      get: (id) => inner.get(id),
      list: (limit) => inner.list(limit),
      ping: () => inner.ping(),
      commit: async (s) => {
        if (failNext) {
          failNext = false;
          throw new Error('store unavailable');
        }
        await inner.commit(s);
      },
    };
    const manager = new SnapshotManager(flaky);

    const kept = await manager.replaceTickets([makeTicket()]);
    failNext = true;
    await expect(manager.replaceThresholds([makeThreshold()])).rejects.toThrow('store unavailable');
    expect((await inner.getLatest())?.id).toBe(kept.id);

    const next = await manager.replaceThresholds([makeThreshold()]);
    expect(next.tickets).toHaveLength(1);
    expect((await inner.getLatest())?.id).toBe(next.id);
  });
});
