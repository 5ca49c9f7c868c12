export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type Severity = Exclude<LogLevel, 'silent'>;
type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const SINKS: Record<Severity, (line: string) => void> = {
  debug: line => console.debug(line),
  info: line => console.info(line),
  warn: line => console.warn(line),
  error: line => console.error(line)
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(RANK, value);
}

export function formatLine(level: Severity, message: string, meta?: LogMeta): string {
  const line = `[${new Date().toISOString()}] ${level.toUpperCase()} ${message}`;
  return meta && Object.keys(meta).length > 0 ? `${line} ${JSON.stringify(meta)}` : line;
}

/** Console logger that drops anything ranked below `level`. */
export function createLogger(level: LogLevel = 'info'): Logger {
  const log = (severity: Severity) => (message: string, meta?: LogMeta): void => {
    if (RANK[severity] >= RANK[level]) SINKS[severity](formatLine(severity, message, meta));
  };
  return { debug: log('debug'), info: log('info'), warn: log('warn'), error: log('error') };
}
