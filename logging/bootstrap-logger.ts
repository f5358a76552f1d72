export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type BootstrapStage = 'run' | 'readiness' | 'schema' | 'count' | 'merge' | 'load' | 'verify';

export interface BootstrapLogEntry {
  timestamp: number;
  level: LogLevel;
  stage: BootstrapStage;
  engine?: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: BootstrapLogEntry): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Plain-text sink: `[INFO] message`. Warnings and errors go to stderr.
 */
export class ConsoleLogSink implements LogSink {
  write(entry: BootstrapLogEntry): void {
    const suffix = entry.data && Object.keys(entry.data).length ? ` ${JSON.stringify(entry.data)}` : '';
    const line = `[${entry.level.toUpperCase()}] ${entry.message}${suffix}`;
    if (entry.level === 'error' || entry.level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/** One JSON object per line, for log shippers. */
export class JsonLogSink implements LogSink {
  write(entry: BootstrapLogEntry): void {
    console.log(JSON.stringify({ ...entry, timestamp: new Date(entry.timestamp).toISOString() }));
  }
}

/** Keeps entries in memory. Used by tests and by callers embedding the runner. */
export class MemoryLogSink implements LogSink {
  readonly entries: BootstrapLogEntry[] = [];

  write(entry: BootstrapLogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.message);
  }
}

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization', 'credential', 'cookie'];

/** Strips `user:password@` from every URL in the text. */
export function redactUrlCredentials(text: string): string {
  return text.replace(/(\b[a-z][a-z0-9+.-]*:\/\/)[^\s/@:]+(?::[^\s/@]*)?@/gi, '$1[REDACTED]@');
}

function redactValue(value: unknown, visited: WeakSet<object>): unknown {
  if (typeof value === 'string') {
    return redactUrlCredentials(value);
  }
  if (value === null || typeof value !== 'object') {
    return value;
  }
  if (visited.has(value)) {
    return '[CIRCULAR]';
  }
  visited.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, visited));
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    result[key] = SENSITIVE_KEYS.some((pattern) => lowerKey.includes(pattern))
      ? '[REDACTED]'
      : redactValue(nested, visited);
  }
  return result;
}

export function redactData(data: Record<string, unknown>): Record<string, unknown> {
  const redacted = redactValue(data, new WeakSet());
  return typeof redacted === 'object' && redacted !== null && !Array.isArray(redacted)
    ? { ...redacted }
    : {};
}

export interface BootstrapLoggerOptions {
  sink?: LogSink;
  level?: LogLevel;
  engine?: string;
}

/**
 * Level-filtered, redacting logger shared by every bootstrap step.
 */
export class StructuredBootstrapLogger {
  private readonly sink: LogSink;
  private readonly minLevel: LogLevel;
  private readonly engine?: string;

  constructor(options: BootstrapLoggerOptions = {}) {
    this.sink = options.sink ?? new ConsoleLogSink();
    this.minLevel = options.level ?? 'info';
    this.engine = options.engine;
  }

  debug(stage: BootstrapStage, message: string, data?: Record<string, unknown>): void {
    this.log('debug', stage, message, data);
  }

  info(stage: BootstrapStage, message: string, data?: Record<string, unknown>): void {
    this.log('info', stage, message, data);
  }

  warn(stage: BootstrapStage, message: string, data?: Record<string, unknown>): void {
    this.log('warn', stage, message, data);
  }

  error(stage: BootstrapStage, message: string, data?: Record<string, unknown>): void {
    this.log('error', stage, message, data);
  }

  private log(level: LogLevel, stage: BootstrapStage, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    this.sink.write({
      timestamp: Date.now(),
      level,
      stage,
      engine: this.engine,
      message: redactUrlCredentials(message),
      data: data ? redactData(data) : undefined
    });
  }
}
