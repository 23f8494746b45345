import { PRIORITIES, type Priority, priorityRank } from './types';

export interface IndexEntry {
  readonly id: string;
  band: Priority;
  readonly sequence: number;
  readonly enqueuedAt: number;
  promoted: boolean;
}

export interface PriorityIndexOptions {
  /** Pending time after which an entry moves up one band; 0 disables aging */
  agingThresholdMs: number;
  now?: () => number;
  onPromote?: (entry: IndexEntry, from: Priority) => void;
}

/**
 * Binary heap that tracks each element's slot so arbitrary removal stays O(log n).
 */
class IndexedHeap<E extends { readonly id: string }> {
  private readonly heap: E[] = [];
  private readonly positions = new Map<string, number>();

  constructor(private readonly before: (a: E, b: E) => boolean) {}

  get size(): number {
    return this.heap.length;
  }

  has(id: string): boolean {
    return this.positions.has(id);
  }

  peek(): E | undefined {
    return this.heap[0];
  }

  push(element: E): void {
    this.heap.push(element);
    this.positions.set(element.id, this.heap.length - 1);
    this.siftUp(this.heap.length - 1);
  }

  pop(): E | undefined {
    const top = this.heap[0];
    if (top === undefined) return undefined;
    this.removeAt(0);
    return top;
  }

  remove(id: string): E | undefined {
    const index = this.positions.get(id);
    if (index === undefined) return undefined;
    const element = this.heap[index];
    this.removeAt(index);
    return element;
  }

  values(): readonly E[] {
    return this.heap;
  }

  private removeAt(index: number): void {
    const last = this.heap.pop();
    const removed = index < this.heap.length ? this.heap[index] : last;
    if (removed !== undefined) this.positions.delete(removed.id);
    if (last === undefined || index >= this.heap.length) return;

    this.heap[index] = last;
    this.positions.set(last.id, index);
    this.siftDown(index);
    this.siftUp(index);
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.before(this.at(child), this.at(parent))) break;
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let first = parent;
      if (left < this.heap.length && this.before(this.at(left), this.at(first))) first = left;
      if (right < this.heap.length && this.before(this.at(right), this.at(first))) first = right;
      if (first === parent) return;
      this.swap(parent, first);
      parent = first;
    }
  }

  private at(index: number): E {
    const element = this.heap[index];
    if (element === undefined) {
      throw new RangeError(`Heap index ${index} out of bounds`);
    }
    return element;
  }

  private swap(i: number, j: number): void {
    const a = this.at(i);
    const b = this.at(j);
    this.heap[i] = b;
    this.heap[j] = a;
    this.positions.set(b.id, i);
    this.positions.set(a.id, j);
  }
}

/** Dispatch order: higher band first, then lower sequence (FIFO). */
export function dispatchesBefore(a: IndexEntry, b: IndexEntry): boolean {
  const rankA = priorityRank(a.band);
  const rankB = priorityRank(b.band);
  if (rankA !== rankB) return rankA > rankB;
  return a.sequence < b.sequence;
}

function agesBefore(a: IndexEntry, b: IndexEntry): boolean {
  if (a.enqueuedAt !== b.enqueuedAt) return a.enqueuedAt < b.enqueuedAt;
  return a.sequence < b.sequence;
}

export function nextBand(band: Priority): Priority {
  return PRIORITIES[Math.min(priorityRank(band) + 1, PRIORITIES.length - 1)] ?? band;
}

/**
 * Pending item ordering with lazy aging.
 *
 * Entries not yet promoted also sit in a second heap keyed by the time they
 * entered the index, so each dequeue only touches entries that are due.
 */
export class PriorityIndex {
  private readonly ready = new IndexedHeap<IndexEntry>(dispatchesBefore);
  private readonly aging = new IndexedHeap<IndexEntry>(agesBefore);
  private readonly agingThresholdMs: number;
  private readonly now: () => number;
  private readonly onPromote?: (entry: IndexEntry, from: Priority) => void;

  constructor(options: PriorityIndexOptions) {
    this.agingThresholdMs = options.agingThresholdMs;
    this.now = options.now ?? Date.now;
    this.onPromote = options.onPromote;
  }

  get size(): number {
    return this.ready.size;
  }

  insert(id: string, band: Priority, sequence: number, promoted = false): IndexEntry {
    if (this.ready.has(id)) {
      throw new Error(`Item ${id} is already indexed`);
    }

    const entry: IndexEntry = { id, band, sequence, enqueuedAt: this.now(), promoted };
    this.ready.push(entry);
    if (this.canAge(entry)) {
      this.aging.push(entry);
    }
    return entry;
  }

  /**
   * Promote due entries, then take the first one. Undefined means no work.
   */
  dequeue(): IndexEntry | undefined {
    this.promoteAged(this.now());
    const entry = this.ready.pop();
    if (entry) this.aging.remove(entry.id);
    return entry;
  }

  remove(id: string): IndexEntry | undefined {
    this.aging.remove(id);
    return this.ready.remove(id);
  }

  /**
   * Move every entry pending since at least the threshold up one band, once.
   */
  promoteAged(now: number): IndexEntry[] {
    const promoted: IndexEntry[] = [];
    if (this.agingThresholdMs <= 0) return promoted;

    for (;;) {
      const oldest = this.aging.peek();
      if (!oldest || oldest.enqueuedAt + this.agingThresholdMs > now) break;

      this.aging.pop();
      this.ready.remove(oldest.id);
      const from = oldest.band;
      oldest.band = nextBand(from);
      oldest.promoted = true;
      this.ready.push(oldest);

      promoted.push(oldest);
      this.onPromote?.(oldest, from);
    }

    return promoted;
  }

  /**
   * Entries in the order they would be dispatched right now, without aging.
   */
  ordered(band?: Priority): IndexEntry[] {
    return this.ready
      .values()
      .filter((entry) => band === undefined || entry.band === band)
      .sort((a, b) => (dispatchesBefore(a, b) ? -1 : dispatchesBefore(b, a) ? 1 : 0));
  }

  private canAge(entry: IndexEntry): boolean {
    return this.agingThresholdMs > 0 && !entry.promoted && entry.band !== 'urgent';
  }
}
