export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  category: string;
  context?: Record<string, unknown>;
  level: LogLevel;
  msg: string;
  timestamp: Date;
}

export interface Sink {
  flush(): void;
  write(entry: LogEntry): void;
}

export interface Logger {
  trace(msg: string): void;
  trace(obj: Record<string, unknown>, msg: string): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>, msg: string): void;
  info(msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
  /**
   * Logger for the same category whose entries always carry `bindings`
   * (merged under any per-call context).
   */
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerConfig {
  level?: LogLevel;
  /** Context keys whose values are replaced with `[REDACTED]`, matched case-insensitively. */
  redactKeys?: string[];
  sinks?: Sink[];
}

const levelOrder: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export const DEFAULT_REDACT_KEYS = ['apikey', 'api_key', 'authorization', 'password', 'secret', 'siteid', 'site_id'];

interface ResolvedLoggerConfig {
  level: LogLevel;
  redactKeys: Set<string>;
  sinks: Sink[];
}

let globalConfig: ResolvedLoggerConfig = {
  level: 'info',
  redactKeys: new Set(DEFAULT_REDACT_KEYS),
  sinks: [],
};

const loggerCache = new Map<string, Logger>();

/**
 * Serializes a context object so sinks can format it without surprises.
 * Errors become plain objects, bigint becomes a string, repeated references
 * (circular or shared) become `[Circular]`, configured keys are redacted.
 */
function serializeContext(obj: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();

  const replacer = (key: string, value: unknown): unknown => {
    if (key !== '' && globalConfig.redactKeys.has(key.toLowerCase())) {
      return '[REDACTED]';
    }

    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }

    if (typeof value === 'bigint') {
      return value.toString();
    }

    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };

  try {
    return JSON.parse(JSON.stringify(obj, replacer)) as Record<string, unknown>;
  } catch {
    return { error: '[unserializable]' };
  }
}

class CategoryLogger implements Logger {
  constructor(
    private readonly category: string,
    private readonly bindings?: Record<string, unknown>
  ) {}

  trace(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('trace', msgOrObj, maybeMsg);
  }

  debug(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('debug', msgOrObj, maybeMsg);
  }

  info(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('info', msgOrObj, maybeMsg);
  }

  warn(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('warn', msgOrObj, maybeMsg);
  }

  error(msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    this.log('error', msgOrObj, maybeMsg);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new CategoryLogger(this.category, { ...this.bindings, ...bindings });
  }

  private log(level: LogLevel, msgOrObj: string | Record<string, unknown>, maybeMsg?: string): void {
    if (levelOrder[level] < levelOrder[globalConfig.level]) return;

    const msg = typeof msgOrObj === 'string' ? msgOrObj : (maybeMsg ?? '');
    const raw = typeof msgOrObj === 'string' ? this.bindings : { ...this.bindings, ...msgOrObj };

    const entry: LogEntry = {
      category: this.category,
      level,
      msg,
      timestamp: new Date(),
      ...(raw ? { context: serializeContext(raw) } : {}),
    };

    for (const sink of globalConfig.sinks) {
      sink.write(entry);
    }
  }
}

/**
 * Configure level, redaction and sinks for every logger. Loggers are silent
 * until this is called with at least one sink.
 */
export function initLogger(config: LoggerConfig): void {
  globalConfig = {
    level: config.level ?? 'info',
    redactKeys: new Set((config.redactKeys ?? DEFAULT_REDACT_KEYS).map((key) => key.toLowerCase())),
    sinks: config.sinks ?? [],
  };
  loggerCache.clear();
}

export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) {
    return cached;
  }

  const logger = new CategoryLogger(category);
  loggerCache.set(category, logger);
  return logger;
}

export function flushLoggers(): void {
  for (const sink of globalConfig.sinks) {
    sink.flush();
  }
}
