import { mkdir, open, readFile, readdir, rename, rm, stat, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { DeploymentRecord } from '../types';
import { StoreSettings } from '../config/types';
import { InvalidSpecError, NotFoundError, StorageError, errorMessage } from '../errors';
import { KeyedMutex } from '../lib/keyed-mutex';
import { sleep } from '../lib/retry';
import { logger as rootLogger, Logger } from '../lib/logger';
import { parseRecord, validateRecord } from './record-schema';

export type RecordMutation = (current: DeploymentRecord | null) => DeploymentRecord | Promise<DeploymentRecord>;

/**
 * Persistence for deployment records, keyed by project name
 */
export interface RecordStore {
  get(projectName: string): Promise<DeploymentRecord | null>;
  put(record: DeploymentRecord): Promise<void>;
  /** Read-modify-write under the project's lock. A throwing mutation writes nothing. */
  update(projectName: string, mutate: RecordMutation): Promise<DeploymentRecord>;
  list(): Promise<DeploymentRecord[]>;
  delete(projectName: string): Promise<void>;
  withLock<T>(projectName: string, fn: () => Promise<T>): Promise<T>;
}

const KEY_PATTERN = /^[a-zA-Z][a-zA-Z0-9-]*$/;
const LOCK_POLL_MS = 25;

function errnoCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * One JSON file per project. Writes go to a temporary file that is renamed
 * over the record, so readers never see a partial record. Updates take an
 * in-process mutex and a lock file, which also serializes separate processes
 * sharing the directory.
 */
export class FileRecordStore implements RecordStore {
  private readonly mutex = new KeyedMutex();
  private readonly log: Logger;

  constructor(private readonly settings: StoreSettings, log: Logger = rootLogger) {
    this.log = log.child({ component: 'record-store' });
  }

  async get(projectName: string): Promise<DeploymentRecord | null> {
    const path = this.recordPath(projectName);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw new StorageError(`Failed to read deployment record ${projectName}: ${errorMessage(error)}`, {
        projectName,
        cause: error
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.log.warn({ projectName, path, err: error }, 'Ignoring corrupted deployment record');
      return null;
    }

    const record = parseRecord(parsed);
    if (!record) {
      this.log.warn({ projectName, path, errors: validateRecord(parsed).errors }, 'Ignoring invalid deployment record');
      return null;
    }
    return record;
  }

  async put(record: DeploymentRecord): Promise<void> {
    await this.withLock(record.projectName, () => this.write(record));
  }

  async update(projectName: string, mutate: RecordMutation): Promise<DeploymentRecord> {
    return this.withLock(projectName, async () => {
      const current = await this.get(projectName);
      const next = await mutate(current);
      if (next.projectName !== projectName) {
        throw new StorageError(`Record for ${next.projectName} cannot be stored under ${projectName}`, { projectName });
      }
      await this.write(next);
      return next;
    });
  }

  async list(): Promise<DeploymentRecord[]> {
    let entries: string[];
    try {
      entries = await readdir(this.settings.directory);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return [];
      }
      throw new StorageError(`Failed to list deployment records: ${errorMessage(error)}`, { cause: error });
    }

    const names = entries
      .filter(entry => entry.endsWith('.json'))
      .map(entry => entry.slice(0, -'.json'.length))
      .filter(name => KEY_PATTERN.test(name))
      .sort();

    const records: DeploymentRecord[] = [];
    for (const name of names) {
      const record = await this.get(name);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  async delete(projectName: string): Promise<void> {
    await this.withLock(projectName, async () => {
      try {
        await unlink(this.recordPath(projectName));
      } catch (error) {
        if (errnoCode(error) === 'ENOENT') {
          throw new NotFoundError(`No deployment record found for ${projectName}`, { projectName });
        }
        throw new StorageError(`Failed to delete deployment record ${projectName}: ${errorMessage(error)}`, {
          projectName,
          cause: error
        });
      }
    });
  }

  async withLock<T>(projectName: string, fn: () => Promise<T>): Promise<T> {
    this.checkKey(projectName);
    return this.mutex.runExclusive(projectName, async () => {
      const release = await this.acquireFileLock(projectName);
      try {
        return await fn();
      } finally {
        await release();
      }
    });
  }

  private async write(record: DeploymentRecord): Promise<void> {
    const validation = validateRecord(record);
    if (!validation.valid) {
      throw new StorageError(
        `Refusing to store invalid deployment record ${record.projectName}: ${validation.errors.join('; ')}`,
        { projectName: record.projectName }
      );
    }

    const path = this.recordPath(record.projectName);
    const tempPath = `${path}.${uuidv4()}.tmp`;
    try {
      await mkdir(this.settings.directory, { recursive: true });
      await writeFile(tempPath, JSON.stringify(record, null, 2), 'utf-8');
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new StorageError(`Failed to write deployment record ${record.projectName}: ${errorMessage(error)}`, {
        projectName: record.projectName,
        cause: error
      });
    }
  }

  private async acquireFileLock(projectName: string): Promise<() => Promise<void>> {
    const lockPath = this.lockPath(projectName);
    const owner = uuidv4();
    const deadline = Date.now() + this.settings.lockTimeoutMs;

    try {
      await mkdir(this.settings.directory, { recursive: true });
    } catch (error) {
      throw new StorageError(`Failed to create store directory: ${errorMessage(error)}`, { projectName, cause: error });
    }

    for (;;) {
      try {
        const handle = await open(lockPath, 'wx');
        try {
          await handle.writeFile(JSON.stringify({ owner, pid: process.pid, createdAt: new Date().toISOString() }));
        } finally {
          await handle.close();
        }
        return () => this.releaseFileLock(projectName, lockPath, owner);
      } catch (error) {
        if (errnoCode(error) !== 'EEXIST') {
          throw new StorageError(`Failed to acquire lock for ${projectName}: ${errorMessage(error)}`, {
            projectName,
            cause: error
          });
        }
      }

      if (await this.isStale(lockPath)) {
        this.log.warn({ projectName, lockPath }, 'Breaking stale record lock');
        await rm(lockPath, { force: true });
        continue;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new StorageError(
          `Timed out after ${this.settings.lockTimeoutMs}ms waiting for the lock on ${projectName}`,
          { projectName }
        );
      }
      await sleep(Math.min(LOCK_POLL_MS, remaining));
    }
  }

  private async releaseFileLock(projectName: string, lockPath: string, owner: string): Promise<void> {
    let content: string;
    try {
      content = await readFile(lockPath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        this.log.warn({ projectName, lockPath }, 'Record lock disappeared before release');
        return;
      }
      throw new StorageError(`Failed to release lock for ${projectName}: ${errorMessage(error)}`, {
        projectName,
        cause: error
      });
    }

    if (content.includes(owner)) {
      await rm(lockPath, { force: true });
    } else {
      this.log.warn({ projectName, lockPath }, 'Record lock was taken over by another owner');
    }
  }

  private async isStale(lockPath: string): Promise<boolean> {
    try {
      const info = await stat(lockPath);
      return Date.now() - info.mtimeMs > this.settings.staleLockMs;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        // Released between our attempt and the check
        return false;
      }
      throw new StorageError(`Failed to inspect lock ${lockPath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private checkKey(projectName: string): void {
    if (!KEY_PATTERN.test(projectName)) {
      throw new InvalidSpecError(`Invalid project name: ${projectName}`, [], { projectName });
    }
  }

  private recordPath(projectName: string): string {
    this.checkKey(projectName);
    return join(this.settings.directory, `${projectName}.json`);
  }

  private lockPath(projectName: string): string {
    return join(this.settings.directory, `${projectName}.lock`);
  }
}
