#!/usr/bin/env node
import * as path from 'node:path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { Config, isValidPort, loadConfig } from './config';
import { createLogger, isLogLevel, LogLevel } from './logger';
import { startServer, stopServer } from './server';

export const VERSION = '0.1.0';

export type CliFlags = {
  host?: string;
  port?: number;
  file?: string;
  logLevel?: LogLevel;
};

function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || !isValidPort(port)) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('Expected one of debug, info, warn, error, silent.');
  }
  return value;
}

export function banner(year: number = new Date().getFullYear()): string {
  return `TODO API Server. Version ${VERSION}\nCopyright ${year}\nUsage information:`;
}

export function buildProgram(): Command {
  return new Command()
    .name('todo-server')
    .description('Serve a JSON file backed task list over HTTP')
    .version(VERSION)
    .helpOption('--help', 'display help for command')
    .option('-h, --host <host>', 'server host')
    .option('-p, --port <port>', 'server port', parsePort)
    .option('-f, --file <file>', 'todo JSON file')
    .option('--log-level <level>', 'debug | info | warn | error | silent', parseLogLevel)
    .addHelpText('beforeAll', banner())
    .exitOverride();
}

/** Flags win over the config file; a relative `--file` resolves against `cwd`. */
export function resolveConfig(flags: CliFlags, cwd: string = process.cwd()): Config {
  const config = loadConfig(cwd);
  return {
    ...config,
    host: flags.host ?? config.host,
    port: flags.port ?? config.port,
    file: flags.file !== undefined ? path.resolve(cwd, flags.file) : config.file,
    logLevel: flags.logLevel ?? config.logLevel
  };
}

export function parseFlags(argv: string[]): CliFlags {
  const program = buildProgram();
  program.parse(argv, { from: 'user' });
  return program.opts<CliFlags>();
}

async function main(): Promise<void> {
  let flags: CliFlags;
  try {
    flags = parseFlags(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CommanderError) process.exit(err.exitCode);
    throw err;
  }

  const config = resolveConfig(flags);
  const logger = createLogger(config.logLevel);
  const server = await startServer({
    host: config.host,
    port: config.port,
    file: config.file,
    requestTimeoutMs: config.requestTimeoutMs,
    maxBodyBytes: config.maxBodyBytes,
    logger
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    stopServer(server).then(
      () => process.exit(0),
      err => {
        logger.error(`Shutdown failed: ${String(err)}`);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (require.main === module) {
  main().catch(err => {
    console.error(err);
    process.exit(1);
  });
}
