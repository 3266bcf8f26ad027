/**
 * Levelled console logger with a component tag per line
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

class Logger {
  private level: LogLevel = 'info';

  constructor() {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (isLogLevel(envLevel)) {
      this.level = envLevel;
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(tag: string, args: unknown[]): string[] {
    const timestamp = new Date().toISOString().slice(11, 19);
    return [`[${timestamp}] ${tag}`, ...args.map(formatArg)];
  }

  debug(tag: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.debug(...this.formatMessage(tag, args));
    }
  }

  info(tag: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(...this.formatMessage(tag, args));
    }
  }

  warn(tag: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(...this.formatMessage(tag, args));
    }
  }

  error(tag: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(...this.formatMessage(tag, args));
    }
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack || `${arg.name}: ${arg.message}`;
  }
  return typeof arg === 'object' ? JSON.stringify(arg) : String(arg);
}

export const logger = new Logger();

export { Logger };
