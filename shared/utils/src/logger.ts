import type { LogLevel } from '@teamwork-mcp/shared-types';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const SENSITIVE_KEYS = new Set([
  'password',
  'secret',
  'token',
  'authorization',
  'access_token',
  'accesstoken',
  'bearer',
  'x-gateway-secret',
  'credentials',
]);

const REDACTED = '[REDACTED]';

function sanitize(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'bigint') return value.toString();
  if (typeof value !== 'object') return value;

  if (value instanceof Date) return value.toISOString();
  if (value instanceof Error) return { name: value.name, message: sanitizeString(value.message) };

  // `seen` holds the current ancestors only, so shared references are not circular
  if (seen.has(value)) return '[Circular]';
  seen.add(value);
  try {
    if (value instanceof Map) return sanitize(Object.fromEntries(value), seen);
    if (Array.isArray(value)) return value.map((item) => sanitize(item, seen));

    const sanitized: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      sanitized[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : sanitize(entry, seen);
    }
    return sanitized;
  } finally {
    seen.delete(value);
  }
}

// Credentials that can leak into error messages and URLs
const SENSITIVE_PATTERNS = [
  /(?<=:\/\/[^:/]+:)[^@]+(?=@)/g,
  /(?<=bearer\s)\S+/gi,
  /(?<=token[=:])\s*[^\s&]+/gi,
  /(?<=secret[=:])\s*[^\s&]+/gi,
];

export function sanitizeString(str: string): string {
  let result = str;
  for (const pattern of SENSITIVE_PATTERNS) {
    result = result.replace(pattern, REDACTED);
  }
  return result;
}

function formatContext(context: unknown): string {
  if (context instanceof Error) {
    return sanitizeString(context.stack ?? context.message);
  }
  return JSON.stringify(sanitize(context));
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * Console logger with level filtering and secret redaction.
 * Child loggers share the parent's level.
 */
class Logger {
  private state: { level: LogLevel };
  private readonly scope?: string;

  constructor(level: LogLevel = 'info', scope?: string, state?: { level: LogLevel }) {
    this.state = state ?? { level };
    this.scope = scope;
  }

  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(this.state.level, nested, this.state);
  }

  debug(message: string, context?: unknown) {
    if (this.shouldLog('debug')) console.log(this.format('debug', message, context));
  }

  info(message: string, context?: unknown) {
    if (this.shouldLog('info')) console.log(this.format('info', message, context));
  }

  warn(message: string, context?: unknown) {
    if (this.shouldLog('warn')) console.warn(this.format('warn', message, context));
  }

  error(message: string, context?: unknown) {
    if (this.shouldLog('error')) console.error(this.format('error', message, context));
  }

  setLevel(level: LogLevel) {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.state.level);
  }

  private format(level: LogLevel, message: string, context?: unknown): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    const scope = this.scope ? ` [${this.scope}]` : '';
    const line = `[${timestamp}] [${levelStr}]${scope} ${sanitizeString(message)}`;
    return context === undefined ? line : `${line} ${formatContext(context)}`;
  }
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();

export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info');

export { Logger };
