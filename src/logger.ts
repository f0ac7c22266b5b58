export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  trace: (msg: string, meta?: LogMeta) => void
  debug: (msg: string, meta?: LogMeta) => void
  info: (msg: string, meta?: LogMeta) => void
  warn: (msg: string, meta?: LogMeta) => void
  error: (msg: string, meta?: LogMeta) => void
  child: (bindings: LogMeta) => Logger
}

const levelOrder: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50
};

export const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(levelOrder, value);

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = (value ?? 'info').toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
};

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export const createLogger = (options: { level?: LogLevel, bindings?: LogMeta, sink?: LogSink } = {}): Logger => {
  const threshold = levelOrder[options.level ?? 'info'];
  const bindings = options.bindings ?? {};
  const sink = options.sink ?? consoleSink;

  const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (levelOrder[level] < threshold) return;
    sink(level, JSON.stringify({
      level,
      time: new Date().toISOString(),
      msg: message,
      ...bindings,
      ...meta
    }));
  };

  return {
    trace: (msg, meta) => { log('trace', msg, meta); },
    debug: (msg, meta) => { log('debug', msg, meta); },
    info: (msg, meta) => { log('info', msg, meta); },
    warn: (msg, meta) => { log('warn', msg, meta); },
    error: (msg, meta) => { log('error', msg, meta); },
    child: extra => createLogger({ level: options.level, bindings: { ...bindings, ...extra }, sink })
  };
};

export const logger = createLogger({ level: parseLogLevel(process.env.LOG_LEVEL) });
