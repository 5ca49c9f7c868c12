import { NotFoundError, ValidationError } from './errors';
import { StoredTask, Task } from './types';

/**
 * Ordered task collection. Insertion order is the only ordering and a task's
 * position is always its index + 1, computed on every read.
 */
export class TaskList {
  private readonly items: StoredTask[];

  constructor(items: StoredTask[] = []) {
    this.items = items.map(item => ({ ...item }));
  }

  get length(): number {
    return this.items.length;
  }

  add(description: string, now: Date = new Date()): Task {
    if (!description.trim()) {
      throw new ValidationError('Task description must not be empty');
    }
    this.items.push({
      task: description,
      done: false,
      createdAt: now.toISOString()
    });
    return this.view(this.items.length - 1);
  }

  complete(position: number, now: Date = new Date()): Task {
    const index = this.indexOf(position);
    const item = this.items[index];
    if (!item.done) {
      item.done = true;
      item.completedAt = now.toISOString();
    }
    return this.view(index);
  }

  delete(position: number): Task {
    const index = this.indexOf(position);
    const [removed] = this.items.splice(index, 1);
    return { ...removed, position };
  }

  get(position: number): Task {
    return this.view(this.indexOf(position));
  }

  all(): Task[] {
    return this.items.map((_, index) => this.view(index));
  }

  toJSON(): StoredTask[] {
    return this.items.map(item => ({ ...item }));
  }

  private indexOf(position: number): number {
    if (!Number.isInteger(position) || position < 1 || position > this.items.length) {
      throw new NotFoundError(`Task ${position} does not exist`);
    }
    return position - 1;
  }

  private view(index: number): Task {
    return { ...this.items[index], position: index + 1 };
  }
}
