/**
 * Crash Recovery Integration Tests
 * Restarts the manager from snapshots in memory and on disk.
 */

import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { QueueManager } from '../../src/core/QueueManager';
import { SNAPSHOT_VERSION, encodeSnapshot, tallyItems, type QueueSnapshot } from '../../src/core/snapshot';
import { FileSnapshotStore, MemorySnapshotStore, type SnapshotStore } from '../../src/core/SnapshotStore';
import type { ProcessResult, Processor, QueueItem, TransitionKind } from '../../src/core/types';

const jobSchema = z.object({ url: z.string() });
type Job = z.infer<typeof jobSchema>;

const managers: QueueManager<Job>[] = [];

const succeed: Processor<Job> = async () => ({ ok: true });

function createManager(store: SnapshotStore, processor: Processor<Job> = succeed): QueueManager<Job> {
  const manager = new QueueManager<Job>({
    processor,
    payloadSchema: jobSchema,
    store,
    config: { baseBackoffMs: 1, maxBackoffMs: 10 },
  });
  managers.push(manager);
  return manager;
}

function item(overrides: Partial<QueueItem> & Pick<QueueItem, 'id' | 'sequence'>): QueueItem {
  return {
    payload: { url: `https://example.com/watch/${overrides.id}` },
    priority: 'normal',
    submittedAt: 1000,
    state: 'pending',
    attempts: 0,
    promoted: false,
    cancelRequested: false,
    progress: 0,
    ...overrides,
  };
}

function snapshotOf(items: QueueItem[]): QueueSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    savedAt: 2000,
    nextSequence: items.length,
    items,
    statistics: tallyItems(items),
  };
}

afterEach(async () => {
  await Promise.all(managers.splice(0).map((manager) => manager.shutdown({ abortRunning: true })));
});

describe('recovery', () => {
  it('should return running items to pending without losing attempts', async () => {
    const store = new MemorySnapshotStore(
      encodeSnapshot(
        snapshotOf([
          item({ id: 'r1', sequence: 0, state: 'running', attempts: 1, startedAt: 1500 }),
          item({ id: 'p1', sequence: 1, priority: 'low' }),
          item({ id: 's1', sequence: 2, state: 'succeeded', attempts: 1, durationMs: 20 }),
        ])
      )
    );
    const manager = createManager(store);
    const kinds: Array<[TransitionKind, string]> = [];
    manager.subscribe('*', (event) => {
      kinds.push([event.kind, event.itemId]);
    });
    const started: Array<{ recovered: number; source: string }> = [];
    manager.on('queue:started', (info) => started.push(info));

    manager.pause();
    await manager.start();

    expect(started).toEqual([{ recovered: 2, source: 'primary' }]);
    expect(manager.getItem('r1')).toMatchObject({ state: 'pending', attempts: 1 });
    expect(manager.getItem('r1')?.startedAt).toBeUndefined();
    expect(manager.listPending().map((entry) => entry.id)).toEqual(['r1', 'p1']);

    const stats = manager.getStatistics();
    expect(stats).toMatchObject({ submitted: 3, pending: 2, running: 0, succeeded: 1 });

    manager.resume();
    await manager.onIdle();

    expect(manager.getItem('r1')).toMatchObject({ state: 'succeeded', attempts: 2 });
    expect(manager.getStatistics()).toMatchObject({ submitted: 3, succeeded: 3, pending: 0 });
    await manager.shutdown();
    expect(kinds[0]).toEqual(['recovered', 'r1']);
  });

  it('should finish a cancellation that was requested before the crash', async () => {
    const store = new MemorySnapshotStore(
      encodeSnapshot(snapshotOf([item({ id: 'c1', sequence: 0, state: 'running', attempts: 1, cancelRequested: true })]))
    );
    const manager = createManager(store);
    manager.pause();
    await manager.start();

    expect(manager.getItem('c1')?.state).toBe('cancelled');
    expect(manager.getStatistics()).toMatchObject({ submitted: 1, cancelled: 1, running: 0 });
  });

  it('should keep new sequence numbers after the recovered ones', async () => {
    const store = new MemorySnapshotStore(encodeSnapshot(snapshotOf([item({ id: 'old', sequence: 0 })])));
    const manager = createManager(store);
    manager.pause();
    await manager.start();

    const fresh = manager.submit({ url: 'https://example.com/watch/new' });

    expect(manager.getItem(fresh)?.sequence).toBe(1);
    expect(manager.listPending().map((entry) => entry.id)).toEqual(['old', fresh]);
  });

  it('should hold a recovered retry until its backoff ends', async () => {
    const store = new MemorySnapshotStore(
      encodeSnapshot(
        snapshotOf([item({ id: 'w1', sequence: 0, attempts: 1, lastError: 'busy', availableAt: Date.now() + 50 })])
      )
    );
    const manager = createManager(store);
    await manager.start();

    expect(manager.getStatus().waitingRetry).toBe(1);
    expect(manager.getQueuePosition('w1')).toBe(-1);

    const done = await manager.waitFor('w1');
    expect(done).toMatchObject({ state: 'succeeded', attempts: 2 });
  });

  it('should fall back to the backup when a stored payload fails the schema', async () => {
    const store = new MemorySnapshotStore(encodeSnapshot(snapshotOf([item({ id: 'kept', sequence: 0 })])));
    await store.write(encodeSnapshot(snapshotOf([item({ id: 'bad', sequence: 0, payload: { link: 42 } })])));
    const manager = createManager(store);
    const started: Array<{ recovered: number; source: string }> = [];
    manager.on('queue:started', (info) => started.push(info));
    manager.pause();

    await manager.start();

    expect(started).toEqual([{ recovered: 1, source: 'backup' }]);
    expect(manager.getItem('bad')).toBeUndefined();
    expect(manager.getItem('kept')?.state).toBe('pending');
  });

  it('should start empty when no snapshot passes the schema', async () => {
    const store = new MemorySnapshotStore(
      encodeSnapshot(snapshotOf([item({ id: 'bad', sequence: 0, payload: { link: 42 } })]))
    );
    const manager = createManager(store);
    const started: Array<{ recovered: number; source: string }> = [];
    manager.on('queue:started', (info) => started.push(info));

    await manager.start();

    expect(started).toEqual([{ recovered: 0, source: 'empty' }]);
    expect(manager.getStatistics().submitted).toBe(0);
  });

  it('should start empty when the snapshot repeats an item id', async () => {
    const store = new MemorySnapshotStore(
      encodeSnapshot(snapshotOf([item({ id: 'x', sequence: 0 }), item({ id: 'x', sequence: 1 })]))
    );
    const manager = createManager(store);
    const started: Array<{ recovered: number; source: string }> = [];
    manager.on('queue:started', (info) => started.push(info));

    await manager.start();

    expect(started).toEqual([{ recovered: 0, source: 'empty' }]);
    expect(manager.getItem('x')).toBeUndefined();
  });

  it('should save the recovered queue in one complete snapshot', async () => {
    const store = new MemorySnapshotStore(
      encodeSnapshot(
        snapshotOf([
          item({ id: 'r1', sequence: 0, state: 'running', attempts: 1, startedAt: 1500 }),
          item({ id: 'p1', sequence: 1 }),
          item({ id: 'p2', sequence: 2 }),
        ])
      )
    );
    const manager = new QueueManager<Job>({ processor: succeed, payloadSchema: jobSchema, store, config: { dirtyThreshold: 1 } });
    managers.push(manager);
    manager.pause();

    await manager.start();

    expect(store.writeCount).toBe(1);
    const saved = JSON.parse((await store.read()) ?? 'null');
    expect(saved.items.map((entry: { id: string; state: string }) => [entry.id, entry.state])).toEqual([
      ['r1', 'pending'],
      ['p1', 'pending'],
      ['p2', 'pending'],
    ]);
    expect(saved.statistics.global).toMatchObject({ submitted: 3, pending: 3, running: 0 });
  });

  it('should bring back every item that was running when the process died', async () => {
    const store = new MemorySnapshotStore();
    const hang: Processor<Job> = (_payload, context) =>
      new Promise<ProcessResult>((resolve) => {
        context.signal.addEventListener('abort', () => resolve({ ok: false, transient: false, reason: 'aborted' }));
      });
    const first = new QueueManager<Job>({
      processor: hang,
      payloadSchema: jobSchema,
      store,
      config: { workerCount: 3, dirtyThreshold: 1 },
    });
    managers.push(first);
    await first.start();
    const ids = ['a', 'b', 'c'].map((name) => first.submit({ url: `https://example.com/watch/${name}` }));

    await vi.waitFor(async () => {
      const saved = JSON.parse((await store.read()) ?? '{"items":[]}');
      expect(saved.items.filter((entry: { state: string }) => entry.state === 'running')).toHaveLength(3);
    });

    // Restart from what was on disk, without the first manager's shutdown
    const second = createManager(new MemorySnapshotStore(await store.read()));
    second.pause();
    await second.start();

    expect(second.listPending().map((entry) => entry.id)).toEqual(ids);
    for (const [position, name] of ['a', 'b', 'c'].entries()) {
      expect(second.getItem(ids[position] ?? '')).toMatchObject({
        state: 'pending',
        attempts: 1,
        payload: { url: `https://example.com/watch/${name}` },
      });
    }
    expect(second.getStatistics()).toMatchObject({ submitted: 3, pending: 3, running: 0 });
  });

  it('should start empty when the snapshot is unreadable', async () => {
    const manager = createManager(new MemorySnapshotStore('{"version": 2'));
    const started: Array<{ recovered: number; source: string }> = [];
    manager.on('queue:started', (info) => started.push(info));

    await manager.start();

    expect(started).toEqual([{ recovered: 0, source: 'empty' }]);
    expect(manager.getStatistics().submitted).toBe(0);
  });

  it('should import the legacy queue file', async () => {
    const legacy = [
      {
        id: 'dl-1',
        chat_id: 7,
        url: 'https://example.com/watch/1',
        status: 'paused',
        created_time: '2024-01-01T00:00:00.000Z',
        retry_count: 0,
      },
    ];
    const store = new MemorySnapshotStore(JSON.stringify(legacy));
    const manager = new QueueManager<Record<string, unknown>>({
      processor: async () => ({ ok: true }),
      payloadSchema: z.record(z.unknown()),
      store,
    });
    manager.pause();
    await manager.start();

    expect(manager.getItem('dl-1')).toMatchObject({
      state: 'pending',
      ownerId: '7',
      payload: { url: 'https://example.com/watch/1' },
    });
    await manager.shutdown();
    expect(JSON.parse((await store.read()) ?? '{}')).toMatchObject({ version: SNAPSHOT_VERSION });
  });
});

describe('recovery from disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'media-job-queue-'));
  });

  afterEach(async () => {
    await Promise.all(managers.splice(0).map((manager) => manager.shutdown()));
    await rm(dir, { recursive: true, force: true });
  });

  it('should survive a restart through the snapshot file', async () => {
    const path = join(dir, 'queue.json');
    const first = createManager(new FileSnapshotStore({ path }));
    first.pause();
    await first.start();
    const a = first.submit({ url: 'https://example.com/watch/a' }, 'low', { ownerId: 'chat-1' });
    const b = first.submit({ url: 'https://example.com/watch/b' }, 'urgent');
    await first.shutdown();

    const saved = JSON.parse(await readFile(path, 'utf-8'));
    expect(saved.version).toBe(SNAPSHOT_VERSION);
    expect(saved.items).toHaveLength(2);

    const second = createManager(new FileSnapshotStore({ path }));
    second.pause();
    await second.start();

    expect(second.listPending().map((entry) => entry.id)).toEqual([b, a]);
    expect(second.getItem(a)).toMatchObject({ priority: 'low', ownerId: 'chat-1', payload: { url: 'https://example.com/watch/a' } });
    expect(second.getStatistics().submitted).toBe(2);
  });

  it('should keep the previous snapshot as a backup', async () => {
    const path = join(dir, 'queue.json');
    const store = new FileSnapshotStore({ path });
    await store.write('first');
    await store.write('second');

    expect(await readFile(path, 'utf-8')).toBe('second');
    expect(await readFile(`${path}.bak`, 'utf-8')).toBe('first');
  });

  it('should recover from the backup when the main file is corrupt', async () => {
    const path = join(dir, 'queue.json');
    await writeFile(path, '{"version": 2, "items": [', 'utf-8');
    await writeFile(`${path}.bak`, encodeSnapshot(snapshotOf([item({ id: 'kept', sequence: 0 })])), 'utf-8');

    const manager = createManager(new FileSnapshotStore({ path }));
    const started: Array<{ recovered: number; source: string }> = [];
    manager.on('queue:started', (info) => started.push(info));
    manager.pause();
    await manager.start();

    expect(started).toEqual([{ recovered: 1, source: 'backup' }]);
    expect(manager.getItem('kept')?.state).toBe('pending');
  });
});
