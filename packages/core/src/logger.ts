export type Namespace = 'Worker' | 'Resume' | 'Output' | 'Expand' | 'Traverse' | 'Image' | 'Engine' | 'Cli';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'text' | 'json';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, err?: unknown, meta?: LogMeta): void;
}

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly format?: LogFormat;
  readonly now?: () => Date;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'warning') return 'warn';
  return LOG_LEVELS.find((level) => level === normalized);
}

function errorDetail(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}

function safeStringify(payload: LogMeta): string {
  try {
    return JSON.stringify(payload);
  } catch {
    return JSON.stringify({ ts: payload.ts, level: payload.level, msg: payload.msg });
  }
}

export function createLogger(namespace: Namespace, options: LoggerOptions = {}): Logger {
  const prefix = `[Scriptorium:${namespace}]`;
  const threshold = LEVEL_WEIGHT[options.level ?? 'info'];
  const format = options.format ?? 'text';
  const now = options.now ?? (() => new Date());

  const enabled = (level: LogLevel): boolean => LEVEL_WEIGHT[level] >= threshold;

  const emit = (level: LogLevel, msg: string, meta?: LogMeta, err?: unknown): void => {
    if (!enabled(level)) return;
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.debug;

    if (format === 'json') {
      sink(
        safeStringify({
          ts: now().toISOString(),
          level,
          logger: namespace,
          msg,
          ...(meta ?? {}),
          ...(err !== undefined && { error: errorDetail(err) }),
        }),
      );
      return;
    }

    const args: unknown[] = [`${prefix} ${msg}`];
    if (meta && Object.keys(meta).length > 0) args.push(meta);
    if (err !== undefined) args.push(err);
    sink(...args);
  };

  return {
    debug: (msg, meta) => emit('debug', msg, meta),
    info: (msg, meta) => emit('info', msg, meta),
    warn: (msg, meta) => emit('warn', msg, meta),
    error: (msg, err, meta) => emit('error', msg, meta, err),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
