import type { LogEntry, LogLevel, Sink } from '../logger.js';

/** The subset of `console` the sink writes through. */
export interface ConsoleOutput {
  error(line: string): void;
  log(line: string): void;
  warn(line: string): void;
}

export interface ConsoleSinkOptions {
  color?: boolean;
  /** Lines held between drains before the oldest are dropped. */
  maxPending?: number;
  output?: ConsoleOutput;
}

interface PendingLine {
  category: string;
  level: LogLevel;
  line: string;
}

const levelColors: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

/**
 * Format: [HH:MM:SS] LEVEL [category] message {key=value, ...}
 *
 * Lines are formatted when written and printed on the next macrotask, so a
 * burst of dispatches never waits on the terminal. When more than
 * `maxPending` lines pile up, the oldest are dropped and the next drain
 * reports how many each category lost.
 */
export class ConsoleSink implements Sink {
  private readonly color: boolean;
  private readonly maxPending: number;
  private readonly output: ConsoleOutput;
  private pending: PendingLine[] = [];
  private droppedByCategory = new Map<string, number>();
  private drainScheduled = false;

  constructor(options?: ConsoleSinkOptions) {
    this.color = options?.color ?? false;
    this.maxPending = options?.maxPending ?? 1000;
    this.output = options?.output ?? console;
  }

  write(entry: LogEntry): void {
    if (this.pending.length >= this.maxPending) {
      const oldest = this.pending.shift();
      if (oldest) {
        this.droppedByCategory.set(oldest.category, (this.droppedByCategory.get(oldest.category) ?? 0) + 1);
      }
    }
    this.pending.push({ category: entry.category, level: entry.level, line: this.format(entry) });

    if (!this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => this.drain());
    }
  }

  /** Print everything pending now. Call before process exit. */
  flush(): void {
    this.drain();
  }

  private drain(): void {
    const lines = this.pending;
    const dropped = this.droppedByCategory;
    this.pending = [];
    this.droppedByCategory = new Map();
    this.drainScheduled = false;

    if (dropped.size > 0) {
      const total = [...dropped.values()].reduce((sum, count) => sum + count, 0);
      const categories = [...dropped].map(([category, count]) => `${category}=${count}`).join(', ');
      this.print(
        'warn',
        this.format({
          category: 'logger',
          level: 'warn',
          msg: `Dropped ${total} log entries (buffer overflow) - Categories: ${categories}`,
          timestamp: new Date(),
        })
      );
    }

    for (const { level, line } of lines) {
      this.print(level, line);
    }
  }

  private print(level: LogLevel, line: string): void {
    if (level === 'error') {
      this.output.error(line);
    } else if (level === 'warn') {
      this.output.warn(line);
    } else {
      this.output.log(line);
    }
  }

  private format(entry: LogEntry): string {
    const context = entry.context ? ` ${formatContext(entry.context)}` : '';
    return `${formatTime(entry.timestamp)} ${this.formatLevel(entry.level)} [${entry.category}] ${entry.msg}${context}`;
  }

  private formatLevel(level: LogLevel): string {
    const label = level.toUpperCase().padEnd(5);
    return this.color ? `${levelColors[level]}${label}\x1b[0m` : label;
  }
}

function formatTime(timestamp: Date): string {
  const parts = [timestamp.getHours(), timestamp.getMinutes(), timestamp.getSeconds()];
  return `[${parts.map((part) => String(part).padStart(2, '0')).join(':')}]`;
}

function formatContext(context: Record<string, unknown>): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  return `{${pairs.join(', ')}}`;
}
