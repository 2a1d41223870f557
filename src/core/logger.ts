/**
 * Console logging for the planner
 */

import { Logger } from '../types';

type Level = 'info' | 'warn' | 'error' | 'debug';

/**
 * Writes `[LEVEL] [context] message` lines, followed by the metadata
 * record when one is given. Debug lines print only while DEBUG is set.
 */
export class ConsoleLogger implements Logger {
  constructor(private context?: string) {}

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (process.env.DEBUG) {
      this.write('debug', message, meta);
    }
  }

  private write(level: Level, message: string, meta?: Record<string, unknown>): void {
    const line = `[${level.toUpperCase()}]${this.context ? ` [${this.context}]` : ''} ${message}`;
    const sink = level === 'info' ? console.log : console[level];
    if (meta) {
      sink(line, meta);
    } else {
      sink(line);
    }
  }
}
