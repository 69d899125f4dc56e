/**
 * Structured logging with secret redaction
 *
 * Security requirements:
 * - Never log the Zotero or OpenAI API keys in plaintext
 * - Redact sensitive headers (Zotero-API-Key, Authorization)
 * - Support JSON-lines output for unattended (scheduled) runs
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Context merged into every entry */
  bindings?: Record<string, unknown>;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Patterns to identify sensitive values for redaction
 */
const SENSITIVE_PATTERNS = [
  // OpenAI keys
  /sk-[a-zA-Z0-9_-]{20,}/g,

  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9._-]+/gi,

  // Generic secrets
  /api[_-]?key[=:][a-zA-Z0-9]{10,}/gi,
  /secret[_-]?[a-zA-Z0-9]{10,}/gi,
];

/**
 * Header names that should have their values redacted
 */
const SENSITIVE_HEADERS = new Set([
  'authorization',
  'zotero-api-key',
  'x-api-key',
  'cookie',
  'set-cookie',
]);

/**
 * Object keys that should have their values redacted (compared lower-cased)
 */
const SENSITIVE_KEYS = new Set([
  'apikey',
  'api_key',
  'password',
  'secret',
  'token',
  'accesstoken',
  'access_token',
  'authorization',
  'credentials',
]);

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// =============================================================================
// Redaction Functions
// =============================================================================

/**
 * Redact a potentially sensitive string value
 * Shows first 4 and last 4 characters for debugging
 *
 * @example
 * redactString('sk-abc123xyz789') // 'sk-a...z789'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  if (!value || value.length < 10) {
    return '[REDACTED]';
  }
  return value.substring(0, 4) + '...' + value.substring(value.length - 4);
}

/**
 * Apply pattern-based redaction to a string
 */
export function redactPatterns(value: string): string {
  let result = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => redactString(match));
  }
  return result;
}

/**
 * Redact sensitive values in a value (deep copy with redaction)
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === 'string') {
    return redactPatterns(value);
  }

  if (typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }

  return redactContext(value, depth);
}

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.has(lowerKey) || SENSITIVE_HEADERS.has(lowerKey);
}

/**
 * Redact a context record, masking values stored under sensitive keys
 */
export function redactContext(context: object, depth = 0): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(context)) {
    if (!isSensitiveKey(key)) {
      result[key] = redactValue(entry, depth + 1);
    } else if (typeof entry === 'string' && entry.length > 0) {
      result[key] = redactString(entry);
    } else if (entry !== null && entry !== undefined) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = entry;
    }
  }
  return result;
}

/**
 * Redact sensitive headers from a plain header record
 */
export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};

  for (const [key, value] of Object.entries(headers)) {
    if (SENSITIVE_HEADERS.has(key.toLowerCase())) {
      result[key] = redactString(value);
    } else {
      result[key] = redactPatterns(value);
    }
  }

  return result;
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Logger with human or JSON-lines output and automatic secret redaction
 */
export class Logger {
  private config: Required<LoggerConfig>;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      bindings: config.bindings ?? {},
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactPatterns(message),
    };

    const merged = { ...this.config.bindings, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = redactContext(merged);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: redactPatterns(error.message),
        stack: error.stack ? redactPatterns(error.stack) : undefined,
      };
    }

    return entry;
  }

  /**
   * Format entry for output
   */
  formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack && this.config.level === 'debug') {
        parts.push(`\n  ${entry.error.stack}`);
      }
    }

    return parts.join(' ');
  }

  // Diagnostics go to stderr so that --json stdout stays parseable.
  private output(entry: LogEntry): void {
    console.error(this.formatEntry(entry));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.output(this.createEntry('debug', message, context));
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.output(this.createEntry('info', message, context));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.output(this.createEntry('warn', message, context));
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    this.output(this.createEntry('error', message, context, error));
  }

  /**
   * Log an HTTP request (with redacted sensitive data)
   */
  request(method: string, url: string, headers?: Record<string, string>): void {
    this.debug('HTTP Request', {
      method,
      url: redactPatterns(url),
      headers: headers ? redactHeaders(headers) : undefined,
    });
  }

  /**
   * Log an HTTP response; 4xx/5xx at warn level
   */
  response(status: number, url: string, durationMs?: number): void {
    const context = { status, durationMs };
    if (status >= 400) {
      this.warn(`HTTP Response ${status}: ${redactPatterns(url)}`, context);
    } else {
      this.debug(`HTTP Response ${status}: ${redactPatterns(url)}`, context);
    }
  }

  /**
   * Create a child logger with additional bound context
   */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      bindings: { ...this.config.bindings, ...bindings },
    });
  }

  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }

  getConfig(): Required<LoggerConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return undefined;
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger({
  level: parseLogLevel(process.env.REFNOTE_LOG_LEVEL),
  json: process.env.REFNOTE_LOG_JSON === 'true',
});

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return new Logger(config);
}
