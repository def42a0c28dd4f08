import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFormat = 'text' | 'json';

type LogRecord = {
  ts: string;
  level: Exclude<LogLevel, 'silent'>;
  msg: string;
  [key: string]: unknown;
};

export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Make a log field JSON-friendly: byte strings as hex, errors as name/message.
 */
export function serializeField(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString('hex');
  if (value instanceof Error) {
    const code: unknown = Reflect.get(value, 'code');
    return {
      name: value.name,
      message: value.message,
      ...(code !== undefined ? { code } : {}),
    };
  }
  if (Array.isArray(value)) return value.map(serializeField);
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = serializeField(v);
    }
    return out;
  }
  return String(value);
}

function formatText(record: LogRecord): string {
  const { ts, level, msg, ...extra } = record;
  const fields = Object.entries(extra)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
    .join(' ');
  return `[${ts}] ${level.toUpperCase()} ${msg}${fields ? ` ${fields}` : ''}`;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Where lines go (default: stderr) */
  sink?: LogSink;
}

export class Logger {
  constructor(private readonly options: LoggerOptions = {}) {}

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    const configured = this.options.level ?? 'info';
    return LEVEL_ORDER[level] >= LEVEL_ORDER[configured];
  }

  child(fields: Record<string, unknown>): Logger {
    const parent = this;
    return new (class extends Logger {
      override log(level: Exclude<LogLevel, 'silent'>, msg: string, extra?: Record<string, unknown>): void {
        parent.log(level, msg, { ...fields, ...(extra ?? {}) });
      }
    })(this.options);
  }

  log(level: Exclude<LogLevel, 'silent'>, msg: string, extra?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const fields = serializeField(extra ?? {});
    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...(isPlainObject(fields) ? fields : {}),
    };

    const line =
      (this.options.format ?? 'text') === 'json' ? JSON.stringify(record) : formatText(record);

    if (this.options.sink) {
      this.options.sink(line);
      return;
    }
    process.stderr.write(`${line}\n`);
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}

/** A logger that drops everything */
export const silentLogger = new Logger({ level: 'silent' });

/** Correlates the log lines of one apply or stream run */
export function createRunId(): string {
  return randomUUID();
}
