import * as http from 'node:http';
import { DEFAULT_CONFIG } from './config';
import { createLogger, Logger } from './logger';
import { errorMessage } from './todo/errors';
import { createTodoHandler } from './todo/handlers';
import { TaskStore } from './todo/store';

export interface ServerOptions {
  host?: string;
  port?: number;
  file: string;
  logger?: Logger;
  requestTimeoutMs?: number;
  maxBodyBytes?: number;
  now?: () => Date;
}

export function createTodoServer(options: ServerOptions): http.Server {
  const logger = options.logger ?? createLogger('info');
  const timeoutMs = options.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs;
  const store = new TaskStore(options.file, logger);
  const handle = createTodoHandler({ store, logger, now: options.now, maxBodyBytes: options.maxBodyBytes });

  const server = http.createServer({ requestTimeout: timeoutMs }, (req, res) => {
    handle(req, res).catch((err: unknown) => {
      logger.error(`Unhandled request failure: ${errorMessage(err)}`, { method: req.method, url: req.url });
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'text/plain; charset=utf-8' });
      }
      res.end();
    });
  });
  // idle socket timeout, covers slow response writes
  server.setTimeout(timeoutMs);
  return server;
}

export function startServer(options: ServerOptions): Promise<http.Server> {
  const logger = options.logger ?? createLogger('info');
  const host = options.host ?? DEFAULT_CONFIG.host;
  const port = options.port ?? DEFAULT_CONFIG.port;
  const server = createTodoServer({ ...options, logger });

  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      const address = server.address();
      const actualPort = typeof address === 'object' && address ? address.port : port;
      logger.info(`Local server starting on port ${actualPort}`, { host, file: options.file });
      resolve(server);
    });
  });
}

export function stopServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}
