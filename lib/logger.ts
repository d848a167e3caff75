import type { LogLevel } from '../config/env';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some(level => level === value);
}

export class Logger {
  private readonly threshold: { level: LogLevel };

  constructor(
    level: LogLevel | { level: LogLevel } = 'info',
    private readonly source = 'app'
  ) {
    this.threshold = typeof level === 'string' ? { level } : level;
  }

  setLevel(level: LogLevel): void {
    this.threshold.level = level;
  }

  /** Logger sharing this one's level threshold under a different [source] tag */
  child(source: string): Logger {
    return new Logger(this.threshold, source);
  }

  shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.threshold.level);
  }

  format(level: LogLevel, message: string, data?: unknown): string {
    let output = `${new Date().toISOString()} [${level.toUpperCase()}] [${this.source}] ${message}`;

    if (data instanceof Error) {
      output += `\n${data.stack ?? data.message}`;
    } else if (data !== undefined) {
      output += ' ' + JSON.stringify(data);
    }

    return output;
  }

  debug(message: string, data?: unknown): void {
    if (this.shouldLog('debug')) {
      console.log(this.format('debug', message, data));
    }
  }

  info(message: string, data?: unknown): void {
    if (this.shouldLog('info')) {
      console.log(this.format('info', message, data));
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, data));
    }
  }

  error(message: string, error?: unknown): void {
    if (this.shouldLog('error')) {
      console.error(this.format('error', message, error));
    }
  }
}

const envLevel = process.env.LOG_LEVEL;

export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info', 'server');
