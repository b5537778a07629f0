// Line-oriented logger. Writes to stderr so stdout stays with the console UI.

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = 'warn';

export function configureLogger(options: { level: LogLevel }): void {
  threshold = options.level;
}

function timestamp() {
  return new Date().toISOString().replace('T', ' ').slice(0, 19);
}

function serializeMeta(meta: LogMeta): string {
  return JSON.stringify(meta, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value
  );
}

function write(level: Exclude<LogLevel, 'silent'>, scope: string, message: string, meta?: LogMeta) {
  if (SEVERITY[level] < SEVERITY[threshold]) {
    return;
  }
  const metaStr = meta ? ` ${serializeMeta(meta)}` : '';
  console.error(`${timestamp()} ${level.toUpperCase().padEnd(5)} [${scope}] ${message}${metaStr}`);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, meta) => write('debug', scope, message, meta),
    info: (message, meta) => write('info', scope, message, meta),
    warn: (message, meta) => write('warn', scope, message, meta),
    error: (message, meta) => write('error', scope, message, meta),
  };
}
