import { PRIORITIES, type ItemState, type Priority, type TransitionEvent } from './types';

const DURATION_WINDOW = 1000;

export interface CounterState {
  submitted: number;
  pending: number;
  running: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  durationSum: number;
  durationCount: number;
  /** Most recent durations, oldest first */
  recentDurations: number[];
}

export interface StatisticsState {
  global: CounterState;
  byPriority: Record<Priority, CounterState>;
}

export interface BandStatistics {
  readonly submitted: number;
  readonly pending: number;
  readonly running: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly cancelled: number;
  readonly averageDurationMs: number;
  readonly p95DurationMs: number;
  /** succeeded / (succeeded + failed), 0 when nothing has finished */
  readonly successRate: number;
}

export interface QueueStatistics extends BandStatistics {
  readonly byPriority: Readonly<Record<Priority, BandStatistics>>;
  readonly generatedAt: number;
}

/**
 * Fixed-size ring of the latest durations.
 */
class DurationWindow {
  private readonly buffer: number[] = [];
  private next = 0;

  constructor(private readonly capacity: number) {}

  push(value: number): void {
    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
    } else {
      this.buffer[this.next] = value;
    }
    this.next = (this.next + 1) % this.capacity;
  }

  /** Oldest first. */
  values(): number[] {
    if (this.buffer.length < this.capacity) return [...this.buffer];
    return [...this.buffer.slice(this.next), ...this.buffer.slice(0, this.next)];
  }

  clear(): void {
    this.buffer.length = 0;
    this.next = 0;
  }
}

class Counters {
  readonly states: Record<ItemState, number> = {
    pending: 0,
    running: 0,
    succeeded: 0,
    failed: 0,
    cancelled: 0,
  };
  submitted = 0;
  durationSum = 0;
  durationCount = 0;
  readonly durations = new DurationWindow(DURATION_WINDOW);

  apply(event: TransitionEvent): void {
    if (event.from === null) {
      this.submitted++;
    } else {
      this.states[event.from]--;
    }
    this.states[event.to]++;

    if (event.durationMs !== undefined) {
      this.durationSum += event.durationMs;
      this.durationCount++;
      this.durations.push(event.durationMs);
    }
  }

  view(): BandStatistics {
    const { pending, running, succeeded, failed, cancelled } = this.states;
    const finished = succeeded + failed;
    return {
      submitted: this.submitted,
      pending,
      running,
      succeeded,
      failed,
      cancelled,
      averageDurationMs: this.durationCount === 0 ? 0 : Math.round(this.durationSum / this.durationCount),
      p95DurationMs: percentile(this.durations.values(), 0.95),
      successRate: finished === 0 ? 0 : succeeded / finished,
    };
  }

  export(): CounterState {
    return {
      submitted: this.submitted,
      ...this.states,
      durationSum: this.durationSum,
      durationCount: this.durationCount,
      recentDurations: this.durations.values(),
    };
  }

  restore(state: CounterState): void {
    this.submitted = state.submitted;
    this.states.pending = state.pending;
    this.states.running = state.running;
    this.states.succeeded = state.succeeded;
    this.states.failed = state.failed;
    this.states.cancelled = state.cancelled;
    this.durationSum = state.durationSum;
    this.durationCount = state.durationCount;
    this.durations.clear();
    for (const duration of state.recentDurations.slice(-DURATION_WINDOW)) {
      this.durations.push(duration);
    }
  }
}

/**
 * Nearest-rank percentile.
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.max(Math.ceil(p * sorted.length) - 1, 0);
  return sorted[Math.min(rank, sorted.length - 1)] ?? 0;
}

/**
 * Rolling counters derived from the transition stream. Observational only;
 * scheduling never reads from here.
 */
export class StatisticsAggregator {
  private readonly global = new Counters();
  private readonly bands: Record<Priority, Counters> = {
    low: new Counters(),
    normal: new Counters(),
    high: new Counters(),
    urgent: new Counters(),
  };

  record(event: TransitionEvent): void {
    this.global.apply(event);
    this.bands[event.priority].apply(event);
  }

  /**
   * Move a pending item's contribution from one band to another. Global
   * counters are unaffected.
   */
  reassign(from: Priority, to: Priority): void {
    if (from === to) return;
    this.bands[from].submitted--;
    this.bands[from].states.pending--;
    this.bands[to].submitted++;
    this.bands[to].states.pending++;
  }

  snapshot(now: number = Date.now()): QueueStatistics {
    const byPriority: Record<Priority, BandStatistics> = {
      low: Object.freeze(this.bands.low.view()),
      normal: Object.freeze(this.bands.normal.view()),
      high: Object.freeze(this.bands.high.view()),
      urgent: Object.freeze(this.bands.urgent.view()),
    };

    return Object.freeze({
      ...this.global.view(),
      byPriority: Object.freeze(byPriority),
      generatedAt: now,
    });
  }

  export(): StatisticsState {
    return {
      global: this.global.export(),
      byPriority: {
        low: this.bands.low.export(),
        normal: this.bands.normal.export(),
        high: this.bands.high.export(),
        urgent: this.bands.urgent.export(),
      },
    };
  }

  restore(state: StatisticsState): void {
    this.global.restore(state.global);
    for (const priority of PRIORITIES) {
      this.bands[priority].restore(state.byPriority[priority]);
    }
  }
}

export function emptyCounterState(): CounterState {
  return {
    submitted: 0,
    pending: 0,
    running: 0,
    succeeded: 0,
    failed: 0,
    cancelled: 0,
    durationSum: 0,
    durationCount: 0,
    recentDurations: [],
  };
}

export function emptyStatisticsState(): StatisticsState {
  return {
    global: emptyCounterState(),
    byPriority: {
      low: emptyCounterState(),
      normal: emptyCounterState(),
      high: emptyCounterState(),
      urgent: emptyCounterState(),
    },
  };
}
