import * as http from 'node:http';
import { Logger } from '../logger';
import { DecodeError, errorMessage, NotFoundError, PayloadTooLargeError, statusForError, ValidationError } from './errors';
import { TaskStore } from './store';
import { Task, TaskEnvelope } from './types';

export const GREETING = "There's an API here\n";

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export type RequestHandler = (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void>;

export interface TodoHandlerOptions {
  store: TaskStore;
  logger: Logger;
  now?: () => Date;
  maxBodyBytes?: number;
}

class MethodNotAllowedError extends Error {
  readonly allow: string[];

  constructor(method: string, allow: string[]) {
    super(`Method ${method} not supported`);
    this.allow = allow;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sendJson(res: http.ServerResponse, code: number, payload: unknown): void {
  const body = JSON.stringify(payload);
  res.writeHead(code, { 'Content-Type': 'application/json' });
  res.end(body);
}

function sendText(res: http.ServerResponse, code: number, text: string, headers: http.OutgoingHttpHeaders = {}): void {
  res.writeHead(code, { ...headers, 'Content-Type': 'text/plain; charset=utf-8' });
  res.end(text);
}

function sendNoContent(res: http.ServerResponse): void {
  res.writeHead(204);
  res.end();
}

/**
 * Collects the request body. Past `maxBytes` the rest is drained and
 * dropped so the client still gets a response.
 */
async function readBody(req: http.IncomingMessage, maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let received = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    received += buffer.length;
    if (received <= maxBytes) chunks.push(buffer);
  }
  if (received > maxBytes) {
    throw new PayloadTooLargeError(`Request body exceeds ${maxBytes} bytes`);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

/** Splits a request target into its path and query without resolving it as a URL. */
export function splitTarget(target: string): { pathname: string; query: URLSearchParams } {
  const index = target.indexOf('?');
  if (index < 0) return { pathname: target, query: new URLSearchParams() };
  return { pathname: target.slice(0, index), query: new URLSearchParams(target.slice(index + 1)) };
}

/** Decodes a `{"task": "<text>"}` body into the task description. */
export function decodeNewTask(raw: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new DecodeError(`Invalid JSON body: ${errorMessage(err)}`, err);
  }
  if (!isRecord(parsed) || typeof parsed.task !== 'string') {
    throw new DecodeError('Body must be a JSON object with a string "task" field');
  }
  if (!parsed.task.trim()) {
    throw new ValidationError('Task description must not be empty');
  }
  return parsed.task;
}

/**
 * Parses the `{n}` segment of `/todo/{n}`. Anything that is not a plain
 * decimal number is a bad request; the range check belongs to the list.
 */
export function parsePosition(segment: string): number {
  if (!/^\d+$/.test(segment)) {
    throw new ValidationError(`Invalid ID: ${segment}`);
  }
  const position = Number(segment);
  if (position < 1 || !Number.isSafeInteger(position)) {
    throw new NotFoundError(`Task ${segment} does not exist`);
  }
  return position;
}

type Route =
  | { kind: 'root' }
  | { kind: 'collection' }
  | { kind: 'item'; segment: string }
  | { kind: 'none' };

export function matchRoute(pathname: string): Route {
  if (pathname === '/') return { kind: 'root' };
  if (pathname === '/todo' || pathname === '/todo/') return { kind: 'collection' };
  const match = /^\/todo\/([^/]+)$/.exec(pathname);
  if (match) return { kind: 'item', segment: match[1] };
  return { kind: 'none' };
}

export function createTodoHandler(options: TodoHandlerOptions): RequestHandler {
  const { store, logger } = options;
  const now = options.now ?? (() => new Date());
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

  const envelope = (results: Task[]): TaskEnvelope => ({
    results,
    date: Math.floor(now().getTime() / 1000),
    total_results: results.length
  });

  const replyError = (req: http.IncomingMessage, res: http.ServerResponse, code: number, message: string, headers?: http.OutgoingHttpHeaders): void => {
    const meta = { method: req.method, url: req.url, status: code };
    if (code >= 500) {
      logger.error(message, meta);
    } else {
      logger.warn(message, meta);
    }
    sendText(res, code, `${http.STATUS_CODES[code] ?? 'Error'}\n`, headers);
  };

  const handleCollection = async (method: string, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> => {
    if (method === 'GET') {
      const tasks = await store.read(list => list.all());
      sendJson(res, 200, envelope(tasks));
      return;
    }
    if (method === 'POST') {
      const description = decodeNewTask(await readBody(req, maxBodyBytes));
      const created = await store.update(list => list.add(description, now()));
      logger.info('Task added', { position: created.position });
      sendJson(res, 201, envelope([created]));
      return;
    }
    throw new MethodNotAllowedError(method, ['GET', 'POST']);
  };

  const handleItem = async (method: string, segment: string, query: URLSearchParams, res: http.ServerResponse): Promise<void> => {
    const position = parsePosition(segment);
    if (method === 'GET') {
      const task = await store.read(list => list.get(position));
      sendJson(res, 200, envelope([task]));
      return;
    }
    if (method === 'PATCH') {
      if (!query.has('complete')) {
        throw new ValidationError("Missing query 'complete'");
      }
      await store.update(list => list.complete(position, now()));
      logger.info('Task completed', { position });
      sendNoContent(res);
      return;
    }
    if (method === 'DELETE') {
      await store.update(list => list.delete(position));
      logger.info('Task deleted', { position });
      sendNoContent(res);
      return;
    }
    throw new MethodNotAllowedError(method, ['GET', 'PATCH', 'DELETE']);
  };

  return async (req, res) => {
    const method = req.method ?? 'GET';

    try {
      const { pathname, query } = splitTarget(req.url ?? '/');
      const route = matchRoute(pathname);
      switch (route.kind) {
        case 'root':
          if (method !== 'GET') throw new MethodNotAllowedError(method, ['GET']);
          sendText(res, 200, GREETING);
          return;
        case 'collection':
          await handleCollection(method, req, res);
          return;
        case 'item':
          await handleItem(method, route.segment, query, res);
          return;
        case 'none':
          throw new NotFoundError(`No route for ${pathname}`);
      }
    } catch (err) {
      if (err instanceof MethodNotAllowedError) {
        replyError(req, res, 405, err.message, { Allow: err.allow.join(', ') });
        return;
      }
      replyError(req, res, statusForError(err), errorMessage(err));
    }
  };
}
