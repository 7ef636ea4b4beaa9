import { LogLevel } from '../types';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  log(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Writes one JSON object per line, dropping calls below `minLevel`
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;

  constructor(minLevel: LogLevel = 'info') {
    this.minLevel = minLevel;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  debug(message: string, fields?: LogFields): void {
    if (this.enabled('debug')) console.log(this.format('debug', message, fields));
  }

  log(message: string, fields?: LogFields): void {
    if (this.enabled('info')) console.log(this.format('info', message, fields));
  }

  warn(message: string, fields?: LogFields): void {
    if (this.enabled('warn')) console.warn(this.format('warn', message, fields));
  }

  error(message: string, fields?: LogFields): void {
    if (this.enabled('error')) console.error(this.format('error', message, fields));
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private format(level: LogLevel, message: string, fields?: LogFields): string {
    return JSON.stringify({
      time: new Date().toISOString(),
      level,
      msg: message,
      ...fields,
    });
  }
}

const envLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();

export const defaultLogger = new ConsoleLogger(isLogLevel(envLevel) ? envLevel : 'info');
