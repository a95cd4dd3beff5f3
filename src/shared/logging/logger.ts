import type { LogLevel } from '@/types/logLevel';

/**
 * Structured logger with hierarchical scopes, bound context and optional JSON
 * output. `spam` sits below debug for per-tick traces (stream pacing, cache hits).
 */
export type { LogLevel } from '@/types/logLevel';

const WEIGHTS: Record<LogLevel, number> = {
  spam: 5,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  none: 100,
};

export type LogContext = Record<string, unknown>;

interface LoggerConfig {
  level: LogLevel;
  json: boolean;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  now: () => number;
}

export type LoggerOptions = Partial<LoggerConfig>;

export interface LogEntry {
  at: number;
  level: LogLevel;
  scopes: readonly string[];
  message: string;
  context: LogContext;
}

function stringifyValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') {
    if (value.length === 0) return '""';
    return /[\s"\\[\]]/.test(value) ? JSON.stringify(value) : value;
  }
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      return String(value);
    }
  }
  return String(value);
}

/** `[ts][LEVEL][Scope|Sub] [k=v ...] message`, keys sorted. */
export function formatLine(entry: LogEntry): string {
  const keys = Object.keys(entry.context).sort();
  const ctx = keys.length === 0
    ? ''
    : ` [${keys.map((key) => `${key}=${stringifyValue(entry.context[key])}`).join(' ')}]`;
  const ts = new Date(entry.at).toISOString();
  return `[${ts}][${entry.level.toUpperCase()}][${entry.scopes.join('|')}]${ctx} ${entry.message}`;
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    timestamp: new Date(entry.at).toISOString(),
    level: entry.level,
    scopes: entry.scopes,
    message: entry.message,
    context: entry.context,
  });
}

class LogManager {
  private readonly config: LoggerConfig = {
    level: 'info',
    json: false,
    stdout: process.stdout,
    stderr: process.stderr,
    now: Date.now,
  };

  public configure(options: LoggerOptions): void {
    this.config.level = options.level ?? this.config.level;
    this.config.json = options.json ?? this.config.json;
    this.config.stdout = options.stdout ?? this.config.stdout;
    this.config.stderr = options.stderr ?? this.config.stderr;
    this.config.now = options.now ?? this.config.now;
  }

  public getLevel(): LogLevel {
    return this.config.level;
  }

  public create(component: string, ...scopes: string[]): ComponentLogger {
    return new ComponentLogger(this.config, [component, ...scopes]);
  }
}

export const logManager = new LogManager();

export function createLogger(component: string, ...scopes: string[]): ComponentLogger {
  return logManager.create(component, ...scopes);
}

/**
 * Logger bound to a scope path and, optionally, context fields repeated on
 * every entry (e.g. the session id).
 */
export class ComponentLogger {
  constructor(
    private readonly config: LoggerConfig,
    private readonly scopes: readonly string[],
    private readonly bound: LogContext = {},
  ) {}

  /** Same scopes; `context` is merged under each entry's own fields. */
  public withContext(context: LogContext): ComponentLogger {
    return new ComponentLogger(this.config, this.scopes, { ...this.bound, ...context });
  }

  public spam(message: string, context?: LogContext): void {
    this.write('spam', message, context);
  }

  public debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  public error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context: LogContext = {}): void {
    if (WEIGHTS[level] < WEIGHTS[this.config.level]) {
      return;
    }
    const entry: LogEntry = {
      at: this.config.now(),
      level,
      scopes: this.scopes,
      message,
      context: { ...this.bound, ...context },
    };
    const stream = level === 'error' ? this.config.stderr : this.config.stdout;
    stream.write(`${this.config.json ? formatJson(entry) : formatLine(entry)}\n`);
  }
}
