import * as fs from 'node:fs';
import * as path from 'node:path';
import { isLogLevel, LogLevel } from './logger';

export interface Config {
  host: string;
  port: number;
  file: string;
  logLevel: LogLevel;
  requestTimeoutMs: number;
  maxBodyBytes: number;
}

export const CONFIG_FILES = ['todo-server.config.json', '.todoserverrc.json'];

export const DEFAULT_CONFIG: Config = {
  host: 'localhost',
  port: 8888,
  file: 'todoServer.json',
  logLevel: 'info',
  requestTimeoutMs: 10000,
  maxBodyBytes: 1024 * 1024
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isValidPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 65535;
}

function readConfigFile(filePath: string): Record<string, unknown> | null {
  if (!fs.existsSync(filePath)) return null;
  const raw = fs.readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Config file ${filePath} is not valid JSON: ${String(err)}`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Loads the first config file found in `cwd`. Fields that are missing or have
 * the wrong type fall back to {@link DEFAULT_CONFIG}; `file` is resolved
 * against `cwd`.
 */
export function loadConfig(cwd: string = process.cwd()): Config {
  let configData: Record<string, unknown> = {};
  for (const file of CONFIG_FILES) {
    const loaded = readConfigFile(path.join(cwd, file));
    if (loaded) {
      configData = loaded;
      break;
    }
  }

  const file = typeof configData.file === 'string' && configData.file.trim()
    ? configData.file
    : DEFAULT_CONFIG.file;

  return {
    host: typeof configData.host === 'string' && configData.host.trim()
      ? configData.host
      : DEFAULT_CONFIG.host,
    port: isValidPort(configData.port) ? configData.port : DEFAULT_CONFIG.port,
    file: path.resolve(cwd, file),
    logLevel: isLogLevel(configData.logLevel) ? configData.logLevel : DEFAULT_CONFIG.logLevel,
    requestTimeoutMs: typeof configData.requestTimeoutMs === 'number' && configData.requestTimeoutMs > 0
      ? Math.floor(configData.requestTimeoutMs)
      : DEFAULT_CONFIG.requestTimeoutMs,
    maxBodyBytes: typeof configData.maxBodyBytes === 'number' && configData.maxBodyBytes > 0
      ? Math.floor(configData.maxBodyBytes)
      : DEFAULT_CONFIG.maxBodyBytes
  };
}
