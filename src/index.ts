export { TaskList } from './todo/taskList';
export { TaskStore, parseTaskFile } from './todo/store';
export { createTodoHandler, decodeNewTask, parsePosition, matchRoute, GREETING } from './todo/handlers';
export * from './todo/errors';
export * from './todo/types';
export { createTodoServer, startServer, stopServer } from './server';
export { loadConfig, DEFAULT_CONFIG } from './config';
export { createLogger } from './logger';
export type { Config } from './config';
export type { Logger, LogLevel } from './logger';
export type { ServerOptions } from './server';
