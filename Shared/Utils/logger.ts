/**
 * Shared logger for compilebox packages.
 *
 * Every level goes to stderr: stdout belongs to the MCP JSON-RPC stream.
 * `LOG_LEVEL` picks the threshold, `LOG_FORMAT=json` switches from the
 * bracketed text line to one JSON object per line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const VALID_LOG_LEVELS: readonly string[] = Object.keys(LOG_LEVELS);

function isValidLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && VALID_LOG_LEVELS.includes(value);
}

function readFormat(): LogFormat {
  return process.env.LOG_FORMAT === 'json' ? 'json' : 'text';
}

/**
 * JSON replacer for Error objects, whose own properties are non-enumerable.
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { message: value.message, name: value.name };
    if (value.stack) obj.stack = value.stack;
    if ('code' in value) obj.code = value.code;
    return obj;
  }
  if (typeof value === 'bigint') return value.toString();
  return value;
}

export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private context: string;

  constructor(context: string = 'compilebox') {
    this.context = context;
    const envLevel = process.env.LOG_LEVEL;
    this.level = isValidLogLevel(envLevel) ? envLevel : 'info';
    this.format = readFormat();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    if (this.format === 'json') {
      const record: Record<string, unknown> = {
        time: timestamp,
        level,
        context: this.context,
        msg: message,
      };
      if (data !== undefined) record.data = data;
      return JSON.stringify(record, errorReplacer);
    }
    const base = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      return `${base} ${JSON.stringify(data, errorReplacer)}`;
    }
    return base;
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (this.shouldLog(level)) {
      console.error(this.formatMessage(level, message, data));
    }
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  /**
   * Child logger with `parent:child` context, inheriting level and format.
   */
  child(context: string): Logger {
    const child = new Logger(`${this.context}:${context}`);
    child.level = this.level;
    child.format = this.format;
    return child;
  }

  setContext(context: string): void {
    this.context = context;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }

  getFormat(): LogFormat {
    return this.format;
  }
}
