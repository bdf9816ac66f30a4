export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  scope: string;
  ts: string;
  data?: Record<string, unknown>;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export type LoggerOptions = {
  scope?: string;
  level?: LogLevel;
  sink?: LogSink;
  now?: () => Date;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SENSITIVE_KEYS = ['pin', 'confirmPin'] as const;

export function isLogLevel(value: unknown): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export function redactSensitive(entry: LogEntry): LogEntry {
  const clone: LogEntry = { ...entry };
  if (clone.data) {
    const data = { ...clone.data };
    for (const key of SENSITIVE_KEYS) {
      if (key in data) {
        data[key] = '[redacted]';
      }
    }
    clone.data = data;
  }
  return clone;
}

export function formatLog(entry: LogEntry): string {
  const redacted = redactSensitive(entry);
  return JSON.stringify(redacted);
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
    return;
  }
  if (level === 'warn') {
    console.warn(line);
    return;
  }
  console.log(line);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const scope = options.scope ?? 'pulse';
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());

  const emit = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }
    const entry: LogEntry = { level, message, scope, ts: now().toISOString() };
    if (data && Object.keys(data).length > 0) {
      entry.data = data;
    }
    sink(level, formatLog(entry));
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
    child: (childScope) => createLogger({ ...options, scope: `${scope}/${childScope}` }),
  };
}

/** Logger that drops everything; for embedding where the caller owns output. */
export const silentLogger: Logger = createLogger({ sink: () => undefined });
