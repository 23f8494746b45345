/**
 * StatisticsAggregator Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { StatisticsAggregator, percentile } from '../../src/core/StatisticsAggregator';
import type { ItemState, Priority, TransitionEvent, TransitionKind } from '../../src/core/types';

function event(
  kind: TransitionKind,
  from: ItemState | null,
  to: ItemState,
  priority: Priority = 'normal',
  durationMs?: number
): TransitionEvent {
  return { kind, itemId: 'item-1', priority, from, to, at: 0, attempts: 1, durationMs };
}

describe('StatisticsAggregator', () => {
  it('should count submissions and move items between states', () => {
    const stats = new StatisticsAggregator();
    stats.record(event('submitted', null, 'pending'));
    stats.record(event('submitted', null, 'pending', 'urgent'));
    stats.record(event('dispatched', 'pending', 'running'));

    const snapshot = stats.snapshot(123);
    expect(snapshot.submitted).toBe(2);
    expect(snapshot.pending).toBe(1);
    expect(snapshot.running).toBe(1);
    expect(snapshot.generatedAt).toBe(123);
    expect(snapshot.byPriority.normal.running).toBe(1);
    expect(snapshot.byPriority.urgent.pending).toBe(1);
    expect(snapshot.byPriority.low.submitted).toBe(0);
  });

  it('should keep the state counts equal to submissions', () => {
    const stats = new StatisticsAggregator();
    stats.record(event('submitted', null, 'pending'));
    stats.record(event('submitted', null, 'pending'));
    stats.record(event('submitted', null, 'pending'));
    stats.record(event('dispatched', 'pending', 'running'));
    stats.record(event('retrying', 'running', 'pending'));
    stats.record(event('dispatched', 'pending', 'running'));
    stats.record(event('succeeded', 'running', 'succeeded', 'normal', 10));
    stats.record(event('cancelled', 'pending', 'cancelled'));

    const s = stats.snapshot();
    expect(s.succeeded + s.failed + s.cancelled + s.pending + s.running).toBe(s.submitted);
    expect(s).toMatchObject({ submitted: 3, pending: 1, running: 0, succeeded: 1, cancelled: 1, failed: 0 });
  });

  it('should compute average, p95 and success rate', () => {
    const stats = new StatisticsAggregator();
    for (let i = 1; i <= 20; i++) {
      stats.record(event('submitted', null, 'pending'));
      stats.record(event('dispatched', 'pending', 'running'));
      stats.record(event(i === 20 ? 'failed' : 'succeeded', 'running', i === 20 ? 'failed' : 'succeeded', 'normal', i * 10));
    }

    const s = stats.snapshot();
    expect(s.averageDurationMs).toBe(105);
    expect(s.p95DurationMs).toBe(190);
    expect(s.successRate).toBe(19 / 20);
    expect(s.byPriority.normal.averageDurationMs).toBe(105);
  });

  it('should report zeros before anything finished', () => {
    const s = new StatisticsAggregator().snapshot();
    expect(s.averageDurationMs).toBe(0);
    expect(s.p95DurationMs).toBe(0);
    expect(s.successRate).toBe(0);
  });

  it('should return a frozen snapshot', () => {
    const s = new StatisticsAggregator().snapshot();
    expect(Object.isFrozen(s)).toBe(true);
    expect(Object.isFrozen(s.byPriority)).toBe(true);
    expect(Object.isFrozen(s.byPriority.high)).toBe(true);
  });

  it('should move a pending item between bands on reassign', () => {
    const stats = new StatisticsAggregator();
    stats.record(event('submitted', null, 'pending', 'low'));
    stats.reassign('low', 'urgent');

    const s = stats.snapshot();
    expect(s.submitted).toBe(1);
    expect(s.byPriority.low.submitted).toBe(0);
    expect(s.byPriority.low.pending).toBe(0);
    expect(s.byPriority.urgent.submitted).toBe(1);
    expect(s.byPriority.urgent.pending).toBe(1);
  });

  it('should restore exported state', () => {
    const stats = new StatisticsAggregator();
    stats.record(event('submitted', null, 'pending', 'high'));
    stats.record(event('dispatched', 'pending', 'running', 'high'));
    stats.record(event('succeeded', 'running', 'succeeded', 'high', 40));

    const restored = new StatisticsAggregator();
    restored.restore(stats.export());

    expect(restored.snapshot(1)).toEqual(stats.snapshot(1));
    expect(restored.export().global.recentDurations).toEqual([40]);
  });

  it('should keep only the latest thousand durations for p95', () => {
    const stats = new StatisticsAggregator();
    for (let i = 0; i < 1100; i++) {
      stats.record(event('submitted', null, 'pending'));
      stats.record(event('dispatched', 'pending', 'running'));
      stats.record(event('succeeded', 'running', 'succeeded', 'normal', i < 100 ? 1_000_000 : 5));
    }

    const exported = stats.export().global;
    expect(exported.recentDurations).toHaveLength(1000);
    expect(exported.durationCount).toBe(1100);
    expect(stats.snapshot().p95DurationMs).toBe(5);
  });
});

describe('percentile', () => {
  it('should use the nearest rank', () => {
    const values = Array.from({ length: 20 }, (_, i) => i + 1);
    expect(percentile(values, 0.95)).toBe(19);
    expect(percentile(values, 0.5)).toBe(10);
    expect(percentile([7], 0.95)).toBe(7);
  });

  it('should return 0 for no values', () => {
    expect(percentile([], 0.95)).toBe(0);
  });
});
