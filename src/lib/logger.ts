import { APP_CONFIG } from './config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: string;
  stack?: string;
}

/** Minimal surface accepted by modules that take an injected logger. */
export interface LoggerLike {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  child(context: LogContext): LoggerLike;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(String(value));
}

class Logger implements LoggerLike {
  constructor(private readonly minLevel: LogLevel) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  emit(level: LogLevel, message: string, context?: LogContext, error?: unknown): void {
    if (!this.shouldLog(level)) return;

    const err = error === undefined ? undefined : toError(error);
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && Object.keys(context).length > 0 ? { context } : {}),
      ...(err ? { error: err.message, stack: err.stack } : {}),
    };

    const line = JSON.stringify(entry);

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.emit('error', message, context, error);
  }

  child(defaultContext: LogContext): LoggerLike {
    return new ChildLogger(this, defaultContext);
  }
}

class ChildLogger implements LoggerLike {
  constructor(
    private parent: Logger,
    private defaultContext: LogContext,
  ) {}

  private merge(context?: LogContext): LogContext {
    return { ...this.defaultContext, ...context };
  }

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, this.merge(context));
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, this.merge(context));
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, this.merge(context));
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.parent.error(message, error, this.merge(context));
  }

  child(context: LogContext): LoggerLike {
    return new ChildLogger(this.parent, this.merge(context));
  }
}

const GLOBAL_LOGGER_KEY = '__datasetInsightsLogger__';

function getLogger(): Logger {
  const g = globalThis as unknown as Record<string, Logger | undefined>;
  const existing = g[GLOBAL_LOGGER_KEY];
  if (existing) return existing;
  const created = new Logger(APP_CONFIG.logLevel);
  g[GLOBAL_LOGGER_KEY] = created;
  return created;
}

export const logger = getLogger();
