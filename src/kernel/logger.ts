/**
 * Context-tagged console logger.
 *
 * Levels filter by priority; `DEBUG` in the environment lowers the default level to debug.
 * A custom sink replaces console output, which is how tests capture log lines.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Readonly<Record<string, unknown>>;

export interface LogRecord {
  readonly level: LogLevel;
  readonly context: string;
  readonly message: string;
  readonly data?: LogData;
}

export type LogSink = (record: LogRecord) => void;

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly context?: string;
  readonly silent?: boolean;
  readonly colors?: boolean;
  readonly sink?: LogSink;
}

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
} as const;

const levelColors: Readonly<Record<LogLevel, string>> = {
  debug: colors.gray,
  info: colors.blue,
  warn: colors.yellow,
  error: colors.red,
};

const levelPriority: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private readonly level: LogLevel;
  private readonly context: string;
  private readonly silent: boolean;
  private readonly useColors: boolean;
  private readonly sink: LogSink | undefined;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? (process.env.DEBUG ? 'debug' : 'info');
    this.context = options.context ?? '';
    this.silent = options.silent ?? false;
    this.useColors = options.colors ?? (process.stdout.isTTY ?? false);
    this.sink = options.sink;
  }

  debug(message: string, data?: LogData): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: LogData): void {
    this.write('error', message, data);
  }

  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
      colors: this.useColors,
      ...(this.sink === undefined ? {} : { sink: this.sink }),
    });
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && levelPriority[level] >= levelPriority[this.level];
  }

  private write(level: LogLevel, message: string, data?: LogData): void {
    if (!this.shouldLog(level)) {
      return;
    }

    if (this.sink !== undefined) {
      this.sink({ level, context: this.context, message, ...(data === undefined ? {} : { data }) });
      return;
    }

    const line = this.format(level, message, data);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private format(level: LogLevel, message: string, data?: LogData): string {
    const tag = this.useColors ? `${levelColors[level]}[${level}]${colors.reset}` : `[${level}]`;
    const ctx = this.context === '' ? '' : this.useColors ? ` ${colors.dim}(${this.context})${colors.reset}` : ` (${this.context})`;
    const output = `${tag}${ctx} ${message}`;

    if (data === undefined) {
      return output;
    }

    const dataStr = JSON.stringify(data, null, 2);
    return this.useColors ? `${output}\n${colors.dim}${dataStr}${colors.reset}` : `${output}\n${dataStr}`;
  }
}

export function createLogger(context: string, options: Omit<LoggerOptions, 'context'> = {}): Logger {
  return new Logger({ ...options, context });
}

export const silentLogger = (): Logger => new Logger({ silent: true });
