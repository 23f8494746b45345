import type { Logger } from 'pino';
import { createLogger } from '../utils/logger';
import { PersistenceError } from './errors';
import { decodeSnapshot, encodeSnapshot, type DecodeOutcome, type QueueSnapshot } from './snapshot';
import type { SnapshotStore } from './SnapshotStore';

export interface PersistenceOptions {
  store: SnapshotStore;
  /** 0 disables the periodic timer */
  intervalMs: number;
  dirtyThreshold: number;
  /** Builds the state to persist; called synchronously at the start of a save */
  capture: () => QueueSnapshot;
  /** Runs on every periodic tick, before the dirty check */
  onTick?: () => void;
  /** Returns a reason to treat a well-formed snapshot as unreadable */
  accept?: (snapshot: QueueSnapshot) => string | undefined;
}

export interface LoadResult {
  snapshot: QueueSnapshot | null;
  source: 'primary' | 'backup' | 'empty';
  migratedFrom?: 'legacy';
}

export interface PersistenceStatus {
  dirty: number;
  saving: boolean;
  saves: number;
  lastSavedAt: number | null;
  lastError: string | null;
}

/**
 * Writes snapshots of the queue on a timer and after bursts of changes, and
 * reads the last one back on startup.
 */
export class PersistenceService {
  private readonly logger: Logger;
  private dirty = 0;
  private saves = 0;
  private lastSavedAt: number | null = null;
  private lastError: PersistenceError | null = null;
  private saving: Promise<boolean> | null = null;
  private rerun = false;
  private syncInterval: NodeJS.Timeout | null = null;

  constructor(private readonly options: PersistenceOptions) {
    this.logger = createLogger('persistence');
  }

  /**
   * Start the periodic snapshot timer.
   */
  start(): void {
    if (this.syncInterval || this.options.intervalMs <= 0) return;

    this.syncInterval = setInterval(() => {
      this.options.onTick?.();
      if (this.dirty > 0) {
        void this.flush();
      }
    }, this.options.intervalMs);
    this.syncInterval.unref();
  }

  /**
   * Record state changes; crossing the threshold starts a save without waiting for it.
   */
  markDirty(changes = 1): void {
    this.dirty += changes;
    if (this.dirty >= this.options.dirtyThreshold && !this.saving) {
      void this.flush();
    }
  }

  /**
   * Write a snapshot now. Resolves false when the write failed; never rejects.
   */
  flush(): Promise<boolean> {
    if (this.saving) {
      this.rerun = true;
      return this.saving;
    }

    const run = this.save().then((ok) => {
      this.saving = null;
      const again = this.rerun || this.dirty >= this.options.dirtyThreshold;
      this.rerun = false;
      // A failed write waits for the next tick instead of spinning
      if (ok && again && this.dirty > 0) void this.flush();
      return ok;
    });
    this.saving = run;
    return run;
  }

  private async save(): Promise<boolean> {
    const covered = this.dirty;

    try {
      const contents = encodeSnapshot(this.options.capture());
      await this.options.store.write(contents);
    } catch (err) {
      this.lastError = new PersistenceError('save', err);
      this.logger.error({ err: this.lastError, store: this.options.store.description }, 'Snapshot save failed, continuing in memory');
      return false;
    }

    this.dirty = Math.max(this.dirty - covered, 0);
    this.saves++;
    this.lastSavedAt = Date.now();
    this.lastError = null;
    this.logger.debug({ store: this.options.store.description, covered }, 'Snapshot saved');
    return true;
  }

  /**
   * Read the latest usable snapshot: the primary, then the backup, then nothing.
   */
  async load(): Promise<LoadResult> {
    const primary = await this.readSafely(() => this.options.store.read(), 'primary');
    if (primary) {
      const decoded = this.decode(primary);
      if (decoded.ok) {
        return { snapshot: decoded.snapshot, source: 'primary', migratedFrom: decoded.migratedFrom };
      }
      this.logger.warn({ store: this.options.store.description, reason: decoded.reason }, 'Snapshot unreadable, trying backup');
    }

    const backup = await this.readSafely(() => this.options.store.readBackup(), 'backup');
    if (backup) {
      const decoded = this.decode(backup);
      if (decoded.ok) {
        this.logger.info({ store: this.options.store.description }, 'Recovered queue from backup snapshot');
        return { snapshot: decoded.snapshot, source: 'backup', migratedFrom: decoded.migratedFrom };
      }
      this.logger.warn({ store: this.options.store.description, reason: decoded.reason }, 'Backup snapshot unreadable');
    }

    return { snapshot: null, source: 'empty' };
  }

  getStatus(): PersistenceStatus {
    return {
      dirty: this.dirty,
      saving: this.saving !== null,
      saves: this.saves,
      lastSavedAt: this.lastSavedAt,
      lastError: this.lastError?.message ?? null,
    };
  }

  /**
   * Stop the timer and write a final snapshot.
   */
  async shutdown(): Promise<boolean> {
    if (this.syncInterval) {
      clearInterval(this.syncInterval);
      this.syncInterval = null;
    }

    if (this.saving) {
      await this.saving;
    }
    return this.flush();
  }

  private decode(text: string): DecodeOutcome {
    const decoded = decodeSnapshot(text);
    if (!decoded.ok) return decoded;
    const reason = this.options.accept?.(decoded.snapshot);
    return reason === undefined ? decoded : { ok: false, reason };
  }

  private async readSafely(read: () => Promise<string | null>, which: 'primary' | 'backup'): Promise<string | null> {
    try {
      return await read();
    } catch (err) {
      this.logger.error({ err: new PersistenceError('load', err), which }, 'Snapshot read failed');
      return null;
    }
  }
}
