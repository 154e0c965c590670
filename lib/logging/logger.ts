/**
 * Structured Logger
 *
 * JSON lines with correlation IDs, level filtering from LOG_LEVEL and
 * masking of sensitive fields.
 */

import { nanoid } from 'nanoid';

/**
 * Log levels ordered by severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LOG_LEVEL_NAMES: Record<Exclude<LogLevel, LogLevel.SILENT>, string> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARN]: 'warn',
  [LogLevel.ERROR]: 'error',
};

/**
 * Log context for correlation
 */
export interface LogContext {
  /** Unique analysis/operation ID */
  correlationId?: string;
  /** Service/module name */
  service?: string;
  [key: string]: unknown;
}

/**
 * Structured log entry
 */
export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  service: string;
  correlationId?: string;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  duration?: number;
  [key: string]: unknown;
}

const SENSITIVE_PATTERNS = [
  /password/i,
  /token/i,
  /secret/i,
  /apikey/i,
  /api_key/i,
  /authorization/i,
  /cookie/i,
  /credential/i,
];

function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(fieldName));
}

/**
 * Recursively mask sensitive data in an object
 */
export function maskSensitiveData(data: unknown, depth = 0): unknown {
  if (depth > 10) return '[MAX_DEPTH]';

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    // Provider keys (sk-ant-..., sk-...) never reach the output
    if (/^sk-[a-zA-Z0-9_-]{16,}$/.test(data)) {
      return '[API_KEY_REDACTED]';
    }
    return data;
  }

  if (Array.isArray(data)) {
    return data.map((item) => maskSensitiveData(item, depth + 1));
  }

  if (typeof data === 'object') {
    const masked: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      masked[key] = isSensitiveField(key) ? '[REDACTED]' : maskSensitiveData(value, depth + 1);
    }
    return masked;
  }

  return data;
}

function formatError(error: Error): { name: string; message: string; stack?: string } {
  return {
    name: error.name,
    message: error.message,
    stack: process.env.NODE_ENV !== 'production' ? error.stack : undefined,
  };
}

/**
 * Minimum log level from LOG_LEVEL, defaulting by NODE_ENV
 */
export function getMinLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  switch (env.LOG_LEVEL?.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return env.NODE_ENV === 'production' ? LogLevel.INFO : LogLevel.DEBUG;
  }
}

/**
 * Logger class with context binding
 */
export class Logger {
  private context: LogContext;
  private minLevel: LogLevel;
  private service: string;

  constructor(service: string, context: LogContext = {}, minLevel: LogLevel = getMinLevel()) {
    this.service = service;
    this.context = context;
    this.minLevel = minLevel;
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger(this.service, { ...this.context, ...additionalContext }, this.minLevel);
  }

  withCorrelationId(correlationId: string): Logger {
    return this.child({ correlationId });
  }

  private write(level: Exclude<LogLevel, LogLevel.SILENT>, message: string, meta?: Record<string, unknown>): void {
    if (level < this.minLevel) {
      return;
    }

    const { correlationId, service: _service, ...extraContext } = this.context;
    const maskedMeta = maskSensitiveData({ ...extraContext, ...meta });

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LOG_LEVEL_NAMES[level],
      message,
      service: this.service,
      ...(correlationId ? { correlationId } : {}),
      ...(maskedMeta !== null && typeof maskedMeta === 'object' ? maskedMeta : {}),
    };

    const json = JSON.stringify(entry);

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(json);
        break;
      case LogLevel.INFO:
        console.info(json);
        break;
      case LogLevel.WARN:
        console.warn(json);
        break;
      case LogLevel.ERROR:
        console.error(json);
        break;
    }
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, errorOrMeta?: Error | Record<string, unknown>, meta?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, mergeErrorMeta(errorOrMeta, meta));
  }

  error(message: string, errorOrMeta?: Error | Record<string, unknown>, meta?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, mergeErrorMeta(errorOrMeta, meta));
  }
}

function mergeErrorMeta(
  errorOrMeta?: Error | Record<string, unknown>,
  meta?: Record<string, unknown>
): Record<string, unknown> {
  const finalMeta: Record<string, unknown> = { ...meta };

  if (errorOrMeta instanceof Error) {
    return { ...finalMeta, error: formatError(errorOrMeta) };
  }
  return { ...finalMeta, ...errorOrMeta };
}

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  return `cid_${nanoid(21)}`;
}

export function createLogger(service: string, context?: LogContext): Logger {
  return new Logger(service, context);
}

/**
 * Pre-configured loggers
 */
export const loggers = {
  detection: createLogger('detection'),
  llm: createLogger('llm'),
  cli: createLogger('cli'),
};
