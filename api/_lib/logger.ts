// api/_lib/logger.ts
import { env } from './env';

export type Level = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogBindings = Record<string, unknown>;

const LEVELS: Record<Level, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

function isLevel(v: string): v is Level {
  return v in LEVELS;
}

export function normalizeLevel(input?: string): Level {
  const v = (input || '').toLowerCase();
  return isLevel(v) ? v : 'info';
}

function pickConsole(level: Level): (...args: unknown[]) => void {
  switch (level) {
    case 'trace': return console.debug;
    case 'debug': return console.debug;
    case 'info':  return console.info;
    case 'warn':  return console.warn;
    case 'error': return console.error;
    case 'fatal': return console.error;
    default:      return console.log;
  }
}

function isErrorLike(x: unknown): x is Error {
  return x instanceof Error;
}

const DEFAULT_REDACTIONS = ['authorization', 'password', 'pass', 'token', 'api_key', 'apikey', 'secret', 'set-cookie'];

export function redact(obj: unknown, extraKeys: string[] = []): unknown {
  const keys = new Set([...DEFAULT_REDACTIONS, ...extraKeys].map(k => k.toLowerCase()));
  const seen = new WeakSet<object>();

  function walk(value: unknown): unknown {
    if (value == null) return value;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (typeof value === 'function') return undefined;
    if (isErrorLike(value)) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }
    if (typeof value !== 'object') return value;
    if (seen.has(value)) return '[Circular]';
    seen.add(value);

    if (Array.isArray(value)) return value.map(walk);

    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = keys.has(k.toLowerCase()) ? '[REDACTED]' : walk(v);
    }
    return out;
  }

  return walk(obj);
}

function safeStringify(obj: unknown, limit = 8 * 1024): string {
  try {
    const s = JSON.stringify(obj);
    if (s === undefined) return '';
    if (s.length <= limit) return s;
    return s.slice(0, limit) + '…';
  } catch {
    return '"[Unserializable]"';
  }
}

export interface Logger {
  trace(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  fatal(message: string, data?: unknown): void;
  child(bindings: LogBindings): Logger;
  setLevel(level: Level): void;
  getLevel(): Level;
}

export interface LoggerConfig {
  level: Level;
  service: string;
  env: string;
  version: string;
  pretty: boolean;
  silent: boolean;
  redactKeys: string[];
}

export class ConsoleLogger implements Logger {
  private config: LoggerConfig;
  private readonly bindings: LogBindings;

  constructor(config?: Partial<LoggerConfig>, bindings: LogBindings = {}) {
    this.config = {
      level: normalizeLevel(env.LOG_LEVEL),
      service: env.SERVICE_NAME,
      env: env.NODE_ENV,
      version: env.SERVICE_VERSION,
      pretty: env.NODE_ENV !== 'production' || env.PRETTY_LOGS,
      silent: env.LOG_SILENT,
      redactKeys: [],
      ...config,
    };
    this.bindings = bindings;
  }

  setLevel(level: Level) {
    this.config.level = normalizeLevel(level);
  }
  getLevel(): Level {
    return this.config.level;
  }

  private shouldLog(level: Level): boolean {
    if (this.config.silent) return false;
    return LEVELS[level] >= LEVELS[this.config.level];
  }

  private baseEntry(level: Level, message: string, data?: unknown): Record<string, unknown> {
    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level: level.toUpperCase(),
      service: this.config.service,
      env: this.config.env,
      version: this.config.version,
      message,
      ...this.bindings,
    };

    if (isErrorLike(data)) {
      entry.error = { name: data.name, message: data.message, stack: data.stack };
    } else if (data !== undefined) {
      const redacted = redact(data, this.config.redactKeys);
      if (redacted && typeof redacted === 'object' && !Array.isArray(redacted)) {
        Object.assign(entry, redacted);
      } else {
        entry.data = redacted;
      }
    }
    return entry;
  }

  private log(level: Level, message: string, data?: unknown): void {
    if (!this.shouldLog(level)) return;

    const entry = this.baseEntry(level, message, data);
    const writer = pickConsole(level);

    if (this.config.pretty) {
      const ctx = Object.keys(this.bindings).length
        ? ` [${Object.entries(this.bindings).map(([k, v]) => `${k}=${String(v)}`).join(', ')}]`
        : '';
      const tail = data !== undefined ? ' ' + safeStringify(redact(data, this.config.redactKeys)) : '';
      writer(`[${String(entry.timestamp)}] ${level.toUpperCase()}${ctx}: ${message}${tail}`);
    } else {
      writer(safeStringify(entry));
    }
  }

  trace(msg: string, data?: unknown) { this.log('trace', msg, data); }
  debug(msg: string, data?: unknown) { this.log('debug', msg, data); }
  info (msg: string, data?: unknown) { this.log('info',  msg, data); }
  warn (msg: string, data?: unknown) { this.log('warn',  msg, data); }
  error(msg: string, data?: unknown) { this.log('error', msg, data); }
  fatal(msg: string, data?: unknown) { this.log('fatal', msg, data); }

  child(bindings: LogBindings): Logger {
    // Inherit config & level, merge bindings
    return new ConsoleLogger(this.config, { ...this.bindings, ...bindings });
  }
}

// Base logger instance
export const logger: Logger = new ConsoleLogger();

// Module-scoped child helper
export function withModule(moduleName: string, extra: LogBindings = {}): Logger {
  return logger.child({ module: moduleName, ...extra });
}

// Stable ID helper
export function genId(prefix: string = 'id'): string {
  return `${prefix}_${Date.now().toString(36)}_${Math.random().toString(36).substring(2, 10)}`;
}

// Time an async operation and log its duration
export async function timeOperation<T>(
  log: Logger,
  operationName: string,
  operation: () => Promise<T>,
  extra?: LogBindings
): Promise<T> {
  const startTime = Date.now();

  try {
    log.debug(`Starting ${operationName}`, extra);
    const result = await operation();
    log.debug(`Completed ${operationName}`, { ...extra, duration_ms: Date.now() - startTime });
    return result;
  } catch (error) {
    log.error(`Failed ${operationName}`, { ...extra, duration_ms: Date.now() - startTime, error });
    throw error;
  }
}
