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

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, 'scope'>> = {
  level: 'warn',
  format: 'text',
  destination: process.stderr,
};

function formatScope(scope?: string): string {
  if (!scope) {
    return '';
  }
  return `[${scope}] `;
}

// Error instances have no enumerable fields, so JSON.stringify would drop them.
function serializeMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    result[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return result;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Map a repeated `-v` count onto a level: none = warn, one = info, more = debug. */
export function levelFromVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 2) {
    return 'debug';
  }
  if (verbosity === 1) {
    return 'info';
  }
  return 'warn';
}

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private destination: Writable;
  private scope?: string;
  private readonly children: Logger[] = [];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? DEFAULT_OPTIONS.level;
    this.format = options.format ?? DEFAULT_OPTIONS.format;
    this.destination = options.destination ?? DEFAULT_OPTIONS.destination;
    this.scope = options.scope;
  }

  /**
   * Scoped loggers follow later `configure` calls on their parent, so modules
   * can grab a logger at import time before the CLI has set the level.
   */
  child(scope: string): Logger {
    const child = new Logger({
      level: this.level,
      format: this.format,
      destination: this.destination,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
    });
    this.children.push(child);
    return child;
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
    const { scope: _scope, ...inherited } = options;
    for (const child of this.children) {
      child.configure(inherited);
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
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
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const fields = serializeMetadata(metadata);
    const timestamp = new Date().toISOString();
    if (this.format === 'json') {
      const payload = {
        level,
        time: timestamp,
        message,
        scope: this.scope,
        ...fields,
      };
      this.destination.write(`${JSON.stringify(payload)}\n`);
      return;
    }

    const prefix = `${timestamp} ${level.toUpperCase()} `;
    const strMetadata = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
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
