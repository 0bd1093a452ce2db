/**
 * Logger interfaces and implementations
 *
 * Both loggers write to stderr so stdout stays free for CLI output.
 *
 * Security: forwarded headers and query parameters usually carry the caller's
 * credentials, so their values are redacted from log context.
 */

import { escapeRegExp, isRecord } from './validation-utils.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export interface RedactionConfig {
  headers?: string[];
  queryParams?: string[];
}

const REDACTED = '[REDACTED]';

export function levelFromEnv(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  switch (envLevel) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'SILENT': return LogLevel.SILENT;
    default: return LogLevel.INFO;
  }
}

/**
 * Pick the logger implementation from LOG_FORMAT
 */
export function createLogger(level?: LogLevel, redaction?: RedactionConfig): Logger {
  return process.env.LOG_FORMAT === 'json'
    ? new JsonLogger(level, redaction)
    : new ConsoleLogger(level, redaction);
}

abstract class BaseLogger implements Logger {
  readonly level: LogLevel;
  private redactHeaders: Set<string>;
  private redactParams: string[];

  constructor(level?: LogLevel, redaction?: RedactionConfig) {
    this.level = level ?? levelFromEnv();
    this.redactHeaders = new Set((redaction?.headers ?? []).map(h => h.toLowerCase()));
    this.redactParams = redaction?.queryParams ?? [];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('debug', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('info', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('warn', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const errorContext = error ? {
        error: error.message,
        stack: error.stack,
        ...context,
      } : context;
      this.write('error', message, errorContext);
    }
  }

  protected abstract write(level: string, message: string, context?: Record<string, unknown>): void;

  protected redactSensitive(data: Record<string, unknown>): Record<string, unknown> {
    if (this.redactHeaders.size === 0 && this.redactParams.length === 0) return data;

    const redacted = { ...data };
    if (this.redactHeaders.size > 0 && isRecord(redacted.headers)) {
      redacted.headers = this.redactHeaderValues(redacted.headers);
    }
    if (this.redactParams.length > 0) {
      if (typeof redacted.url === 'string') {
        redacted.url = this.redactQueryParams(redacted.url);
      }
      if (isRecord(redacted.params)) {
        redacted.params = this.redactParamValues(redacted.params);
      }
    }
    return redacted;
  }

  /**
   * Case-insensitive header matching
   */
  private redactHeaderValues(headers: Record<string, unknown>): Record<string, unknown> {
    const redacted = { ...headers };
    for (const key of Object.keys(redacted)) {
      if (this.redactHeaders.has(key.toLowerCase())) {
        redacted[key] = REDACTED;
      }
    }
    return redacted;
  }

  private redactQueryParams(url: string): string {
    try {
      const urlObj = new URL(url);
      for (const name of this.redactParams) {
        if (urlObj.searchParams.has(name)) {
          urlObj.searchParams.set(name, REDACTED);
        }
      }
      return urlObj.toString();
    } catch {
      // Relative URL
      return this.redactParams.reduce(
        (current, name) => current.replace(new RegExp(`([?&]${escapeRegExp(name)}=)[^&]+`, 'gi'), `$1${REDACTED}`),
        url
      );
    }
  }

  private redactParamValues(params: Record<string, unknown>): Record<string, unknown> {
    const redacted = { ...params };
    for (const name of this.redactParams) {
      if (name in redacted) {
        redacted[name] = REDACTED;
      }
    }
    return redacted;
  }
}

/**
 * Default logger, human-readable lines
 */
export class ConsoleLogger extends BaseLogger {
  protected write(level: string, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const redacted = context ? this.redactSensitive(context) : undefined;
    const ctx = redacted ? ` ${JSON.stringify(redacted)}` : '';
    console.error(`[${timestamp}] ${level.toUpperCase()}: ${message}${ctx}`);
  }
}

/**
 * Structured JSON logger for log aggregation
 */
export class JsonLogger extends BaseLogger {
  protected write(level: string, message: string, context?: Record<string, unknown>): void {
    const redacted = context ? this.redactSensitive(context) : undefined;
    const log = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...redacted,
    };
    console.error(JSON.stringify(log));
  }
}
