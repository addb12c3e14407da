import { LOG_BUFFER_SIZE } from '../config/waveTiming';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Structured tags attached to an entry, e.g. `{ eventId }` */
export type LogContext = Readonly<Record<string, string>>;

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  category: string;
  message: string;
  context?: LogContext;
  data?: unknown;
}

export interface EntryFilter {
  category?: string;
  /** Every listed tag must match */
  context?: LogContext;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const CONSOLE_METHODS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export class WaveLogger {
  private entries: LogEntry[] = [];
  private minLevel: LogLevel = 'info';
  private echo = true;

  constructor(private readonly capacity = LOG_BUFFER_SIZE) {}

  setLevel(level: LogLevel) {
    this.minLevel = level;
  }

  /** Toggle console output; entries are still recorded */
  setConsoleOutput(enabled: boolean) {
    this.echo = enabled;
  }

  log(level: LogLevel, category: string, message: string, data?: unknown, context?: LogContext) {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.minLevel]) return;

    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      category,
      message,
      context,
      data,
    };
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }

    if (!this.echo) return;
    const tags = context ? Object.entries(context).map(([k, v]) => ` [${k}=${v}]`).join('') : '';
    const prefix = `[${level.toUpperCase()}] [${category}]${tags}`;
    if (data !== undefined) {
      CONSOLE_METHODS[level](prefix, message, data);
    } else {
      CONSOLE_METHODS[level](prefix, message);
    }
  }

  debug(category: string, message: string, data?: unknown) {
    this.log('debug', category, message, data);
  }

  info(category: string, message: string, data?: unknown) {
    this.log('info', category, message, data);
  }

  warn(category: string, message: string, data?: unknown) {
    this.log('warn', category, message, data);
  }

  error(category: string, message: string, data?: unknown) {
    this.log('error', category, message, data);
  }

  /** Logger bound to a category and a fixed set of tags */
  scoped(category: string, context: LogContext): ScopedLogger {
    return new ScopedLogger(this, category, context);
  }

  getEntries(filter?: string | EntryFilter): LogEntry[] {
    if (!filter) return [...this.entries];
    const { category, context } = typeof filter === 'string' ? { category: filter, context: undefined } : filter;
    return this.entries.filter(
      (e) =>
        (category === undefined || e.category === category) &&
        (context === undefined || Object.entries(context).every(([k, v]) => e.context?.[k] === v)),
    );
  }

  clear() {
    this.entries = [];
  }
}

export class ScopedLogger {
  constructor(
    private readonly target: WaveLogger,
    readonly category: string,
    readonly context: LogContext,
  ) {}

  debug(message: string, data?: unknown) {
    this.target.log('debug', this.category, message, data, this.context);
  }

  info(message: string, data?: unknown) {
    this.target.log('info', this.category, message, data, this.context);
  }

  warn(message: string, data?: unknown) {
    this.target.log('warn', this.category, message, data, this.context);
  }

  error(message: string, data?: unknown) {
    this.target.log('error', this.category, message, data, this.context);
  }
}

export const logger = new WaveLogger();
