export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export type LogSink = (level: LogLevel, line: string) => void;

export type LoggerOptions = {
  service: string;
  base?: LogFields;
  /** Entries below this level are dropped. Defaults to `info`. */
  level?: LogLevel;
  /** Replaces console output, e.g. to capture lines in tests. */
  sink?: LogSink;
};

export type Logger = {
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
  child: (fields: LogFields) => Logger;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function normalizeFields(fields?: LogFields): LogFields {
  if (!fields) return {};
  const out: LogFields = {};
  Object.entries(fields).forEach(([key, value]) => {
    if (value !== undefined) {
      out[key] = value;
    }
  });
  return out;
}

function consoleSink(level: LogLevel, line: string): void {
  if (level === 'error') {
    console.error(line);
    return;
  }
  if (level === 'warn') {
    console.warn(line);
    return;
  }
  console.log(line);
}

export function serializeError(error: unknown): LogFields {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack,
    };
  }
  return {
    errorMessage: String(error),
  };
}

export function createLogger(options: LoggerOptions): Logger {
  const base = normalizeFields(options.base);
  const minRank = LEVEL_RANK[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;

  const write = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_RANK[level] < minRank) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      service: options.service,
      message,
      ...base,
      ...normalizeFields(fields),
    };
    sink(level, JSON.stringify(entry));
  };

  return {
    debug: (message: string, fields?: LogFields) => write('debug', message, fields),
    info: (message: string, fields?: LogFields) => write('info', message, fields),
    warn: (message: string, fields?: LogFields) => write('warn', message, fields),
    error: (message: string, fields?: LogFields) => write('error', message, fields),
    child: (fields: LogFields) => createLogger({
      ...options,
      base: {
        ...base,
        ...normalizeFields(fields),
      },
    }),
  };
}
