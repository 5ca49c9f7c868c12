import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createLogger, Logger } from '../logger';
import { errorMessage, StorageError } from './errors';
import { TaskList } from './taskList';
import { StoredTask } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === 'ENOENT';
}

function toStoredTask(value: unknown, index: number, filePath: string): StoredTask {
  if (!isRecord(value)) {
    throw new StorageError(`${filePath}: entry ${index} is not an object`);
  }
  const { task, done, createdAt, completedAt } = value;
  if (typeof task !== 'string' || typeof done !== 'boolean' || typeof createdAt !== 'string') {
    throw new StorageError(`${filePath}: entry ${index} is not a valid task`);
  }
  // any stored position is dropped here; TaskList derives it from order
  const stored: StoredTask = { task, done, createdAt };
  if (typeof completedAt === 'string') stored.completedAt = completedAt;
  return stored;
}

export function parseTaskFile(raw: string, filePath: string): TaskList {
  if (!raw.trim()) return new TaskList();

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new StorageError(`${filePath} is not valid JSON: ${errorMessage(err)}`, err);
  }
  if (!Array.isArray(parsed)) {
    throw new StorageError(`${filePath} must contain a JSON array of tasks`);
  }
  return new TaskList(parsed.map((entry: unknown, index) => toStoredTask(entry, index, filePath)));
}

/**
 * JSON file backed task store. The file is the only state: every operation
 * loads it fresh, and every load→mutate→save sequence runs one at a time.
 */
export class TaskStore {
  readonly filePath: string;
  private readonly logger: Logger;
  private tail: Promise<void> = Promise.resolve();

  constructor(filePath: string, logger: Logger = createLogger('silent')) {
    this.filePath = filePath;
    this.logger = logger;
  }

  async load(): Promise<TaskList> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        this.logger.debug('Task file missing, starting with an empty list', { file: this.filePath });
        return new TaskList();
      }
      throw new StorageError(`Cannot read ${this.filePath}: ${errorMessage(err)}`, err);
    }
    return parseTaskFile(raw, this.filePath);
  }

  async save(list: TaskList): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const handle = await fs.open(tmpPath, 'w');
      try {
        await handle.writeFile(JSON.stringify(list, null, 2), 'utf-8');
        // flushed before the rename so a power loss cannot surface an empty file
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw new StorageError(`Cannot write ${this.filePath}: ${errorMessage(err)}`, err);
    }
    this.logger.debug('Task file saved', { file: this.filePath, tasks: list.length });
  }

  /** Runs `fn` against the current list without persisting anything. */
  read<T>(fn: (list: TaskList) => T): Promise<T> {
    return this.exclusive(async () => fn(await this.load()));
  }

  /** Load, mutate, save. Nothing is written when `fn` throws. */
  update<T>(fn: (list: TaskList) => T): Promise<T> {
    return this.exclusive(async () => {
      const list = await this.load();
      const result = fn(list);
      await this.save(list);
      return result;
    });
  }

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const run = this.tail.then(work);
    // the chain only orders work; callers see failures through `run`
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
