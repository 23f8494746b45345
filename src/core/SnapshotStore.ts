import { copyFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Durable home of the serialized snapshot.
 */
export interface SnapshotStore {
  readonly description: string;
  /** Null when nothing has been written yet. */
  read(): Promise<string | null>;
  /** The snapshot before the latest write, if the store keeps one. */
  readBackup(): Promise<string | null>;
  write(contents: string): Promise<void>;
}

export interface FileSnapshotStoreOptions {
  path: string;
  /** Defaults to `<path>.bak` */
  backupPath?: string;
}

function isMissing(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}

/**
 * JSON file with a one-deep backup. Writes go to a temp file and are renamed
 * into place, so a crash mid-write leaves the previous file intact.
 */
export class FileSnapshotStore implements SnapshotStore {
  readonly path: string;
  readonly backupPath: string;
  private writes = 0;

  constructor(options: FileSnapshotStoreOptions) {
    this.path = options.path;
    this.backupPath = options.backupPath ?? `${options.path}.bak`;
  }

  get description(): string {
    return this.path;
  }

  read(): Promise<string | null> {
    return readIfExists(this.path);
  }

  readBackup(): Promise<string | null> {
    return readIfExists(this.backupPath);
  }

  async write(contents: string): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });

    try {
      await copyFile(this.path, this.backupPath);
    } catch (err) {
      if (!isMissing(err)) throw err;
    }

    const tempPath = `${this.path}.${process.pid}.${++this.writes}.tmp`;
    await writeFile(tempPath, contents, 'utf-8');
    await rename(tempPath, this.path);
  }
}

/**
 * Keeps snapshots in memory; for tests and for embedding without a disk.
 */
export class MemorySnapshotStore implements SnapshotStore {
  readonly description = 'memory';
  private current: string | null;
  private previous: string | null = null;
  writeCount = 0;

  constructor(initial: string | null = null) {
    this.current = initial;
  }

  async read(): Promise<string | null> {
    return this.current;
  }

  async readBackup(): Promise<string | null> {
    return this.previous;
  }

  async write(contents: string): Promise<void> {
    this.previous = this.current;
    this.current = contents;
    this.writeCount++;
  }
}
