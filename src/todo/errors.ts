export type TodoErrorKind = 'validation' | 'not_found' | 'decode' | 'too_large' | 'storage';

export class TodoError extends Error {
  readonly kind: TodoErrorKind;

  constructor(kind: TodoErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class ValidationError extends TodoError {
  constructor(message: string) {
    super('validation', message);
  }
}

export class NotFoundError extends TodoError {
  constructor(message: string) {
    super('not_found', message);
  }
}

export class DecodeError extends TodoError {
  constructor(message: string, cause?: unknown) {
    super('decode', message, { cause });
  }
}

export class PayloadTooLargeError extends TodoError {
  constructor(message: string) {
    super('too_large', message);
  }
}

export class StorageError extends TodoError {
  constructor(message: string, cause?: unknown) {
    super('storage', message, { cause });
  }
}

const STATUS_BY_KIND: Record<TodoErrorKind, number> = {
  validation: 400,
  not_found: 404,
  decode: 400,
  too_large: 413,
  storage: 500
};

export function statusForError(err: unknown): number {
  return err instanceof TodoError ? STATUS_BY_KIND[err.kind] : 500;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
