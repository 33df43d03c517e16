import type { LogLevel, Logger } from '../types/logger.js';
import { isLevelEnabled } from '../types/logger.js';
import { createColors, supportsColor, type Colors } from './colors.js';

export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface StreamLoggerOptions {
  stream?: OutputStream;
  /** 'none' silences everything; defaults from DEBUG */
  level?: LogLevel | 'none';
  prefix?: string;
  timestamp?: boolean;
  colors?: boolean;
  env?: NodeJS.ProcessEnv;
}

/**
 * DEBUG=dialfetch or DEBUG=* turns debug output on
 */
export function debugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.DEBUG ?? '';
  return value.includes('*') || value.split(',').some((name) => name.trim() === 'dialfetch');
}

/**
 * Human-readable logger for terminals: one line per entry, structured
 * fields appended as JSON.
 */
export class StreamLogger implements Logger {
  private stream: OutputStream;
  private level: LogLevel | 'none';
  private prefix: string;
  private useTimestamp: boolean;
  private colors: Colors;

  constructor(options: StreamLoggerOptions = {}) {
    const env = options.env ?? process.env;
    this.stream = options.stream ?? process.stderr;
    this.level = options.level ?? (debugEnabled(env) ? 'debug' : 'none');
    this.prefix = options.prefix ?? 'dialfetch';
    this.useTimestamp = options.timestamp !== false;
    this.colors = createColors(options.colors ?? supportsColor(this.stream, env));
  }

  debug = (msgOrObj: string | object, ...args: unknown[]): void => this.log('debug', msgOrObj, args);
  info = (msgOrObj: string | object, ...args: unknown[]): void => this.log('info', msgOrObj, args);
  warn = (msgOrObj: string | object, ...args: unknown[]): void => this.log('warn', msgOrObj, args);
  error = (msgOrObj: string | object, ...args: unknown[]): void => this.log('error', msgOrObj, args);

  private shouldLog(level: LogLevel): boolean {
    return this.level !== 'none' && isLevelEnabled(level, this.level);
  }

  private formatTimestamp(): string {
    if (!this.useTimestamp) return '';
    const time = new Date().toTimeString().split(' ')[0];
    return this.colors.gray(`[${time}]`) + ' ';
  }

  private colorize(level: LogLevel, text: string): string {
    if (level === 'warn') return this.colors.yellow(text);
    if (level === 'error') return this.colors.red(text);
    return text;
  }

  private log(level: LogLevel, msgOrObj: string | object, args: unknown[]): void {
    if (!this.shouldLog(level)) return;

    let message: string;
    let fields: object | undefined;
    if (typeof msgOrObj === 'string') {
      message = [msgOrObj, ...args.map(String)].join(' ');
    } else {
      fields = msgOrObj;
      message = args.map(String).join(' ');
    }

    const prefix = this.colors.cyan(`[${this.prefix}]`);
    const suffix = fields && Object.keys(fields).length > 0 ? ' ' + this.colors.dim(JSON.stringify(fields)) : '';
    this.stream.write(`${this.formatTimestamp()}${prefix} ${this.colorize(level, message)}${suffix}\n`);
  }
}
