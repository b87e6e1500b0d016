import { Writable } from 'node:stream';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';
export type LogFormat = 'text' | 'json';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  destination?: Writable;
  scope?: string;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  silent: 100,
  error: 40,
  warn: 30,
  info: 20,
  debug: 10,
};

// Metadata keys that may carry span contents or cipher keys.
const SENSITIVE_KEYS = new Set(['text', 'key', 'params', 'anonymizedText', 'original']);

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, 'scope'>> = {
  level: 'info',
  format: 'text',
  destination: process.stderr,
};

function formatScope(scope?: string): string {
  if (!scope) {
    return '';
  }
  return `[${scope}] `;
}

function scrub(metadata: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(metadata)) {
    result[name] = SENSITIVE_KEYS.has(name) ? '[scrubbed]' : value;
  }
  return result;
}

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private destination: Writable;
  private scope?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? DEFAULT_OPTIONS.level;
    this.format = options.format ?? DEFAULT_OPTIONS.format;
    this.destination = options.destination ?? DEFAULT_OPTIONS.destination;
    this.scope = options.scope;
  }

  child(scope: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      destination: this.destination,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
  }

  configure(options: LoggerOptions): void {
    if (options.level) {
      this.level = options.level;
    }
    if (options.format) {
      this.format = options.format;
    }
    if (options.destination) {
      this.destination = options.destination;
    }
    if (options.scope !== undefined) {
      this.scope = options.scope;
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_VALUES[this.level] <= LEVEL_VALUES[level];
  }

  debug(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('debug', message, metadata);
  }

  info(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('info', message, metadata);
  }

  warn(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('warn', message, metadata);
  }

  error(message: string, metadata: Record<string, unknown> = {}): void {
    this.write('error', message, metadata);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, metadata: Record<string, unknown>) {
    if (!this.isEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const safe = scrub(metadata);
    if (this.format === 'json') {
      const payload = {
        level,
        time: timestamp,
        message,
        scope: this.scope,
        ...safe,
      };
      this.destination.write(`${JSON.stringify(payload)}\n`);
      return;
    }

    const prefix = `${timestamp} ${level.toUpperCase()} `;
    const strMetadata = Object.keys(safe).length > 0 ? ` ${JSON.stringify(safe)}` : '';
    this.destination.write(`${prefix}${formatScope(this.scope)}${message}${strMetadata}\n`);
  }
}

const globalLogger = new Logger();

export function getLogger(scope?: string): Logger {
  return scope ? globalLogger.child(scope) : globalLogger;
}

export function configureLogger(options: LoggerOptions): void {
  globalLogger.configure(options);
}

export function parseLogLevel(value?: string): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  if (!match) {
    throw new Error(`Unsupported log level "${value}". Use one of ${LOG_LEVELS.join(',')}.`);
  }
  return match;
}

export function parseLogFormat(value?: string): LogFormat | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (normalized === 'json' || normalized === 'text') {
    return normalized;
  }
  throw new Error(`Unsupported log format "${value}". Use text or json.`);
}
