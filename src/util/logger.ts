import type { LoggerLike } from '../types/index.js';
import { appendFileSync } from 'fs';

const COLORS = {
  reset: '\x1b[0m',
  error: '\x1b[31m', // Red
  warn: '\x1b[33m', // Yellow
  info: '\x1b[36m', // Cyan
  debug: '\x1b[90m', // Gray
};

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export class DefaultLogger implements LoggerLike {
  private readonly level: LogLevel;
  private readonly path?: string;

  constructor(options?: { level?: LogLevel; path?: string }) {
    this.level = options?.level || 'info';
    this.path = options?.path;
  }

  private shouldLog(method: LogLevel): boolean {
    return LOG_LEVELS.indexOf(method) <= LOG_LEVELS.indexOf(this.level);
  }

  private saveLog(type: LogLevel, message: unknown, rest: unknown[]) {
    if (!this.path) return;
    const details = rest.map(arg => (arg instanceof Error ? arg.message : String(arg))).join('| ');
    appendFileSync(this.path, `[${type}][${new Date().toISOString()}] ${String(message)} ${details}\n`);
  }

  private write(level: LogLevel, args: unknown[]) {
    if (!this.shouldLog(level)) return;
    const [message, ...rest] = args;
    console[level](`${COLORS[level]}[scheduler][${level}]`, message, COLORS.reset, ...rest);
    this.saveLog(level, message, rest);
  }

  error(...args: unknown[]) {
    this.write('error', args);
  }
  warn(...args: unknown[]) {
    this.write('warn', args);
  }
  info(...args: unknown[]) {
    this.write('info', args);
  }
  debug(...args: unknown[]) {
    this.write('debug', args);
  }
}
