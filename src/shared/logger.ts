// ---------------------------------------------------------------------------
// Mail2SMS — Structured Logger
// ---------------------------------------------------------------------------
// JSON or human-readable lines, to the console or appended to a file.
// Modules receive a child logger prefixed with their module ID.
// ---------------------------------------------------------------------------

import * as fs from 'fs';
import * as path from 'path';
import { ILogger } from '../core/types/module';
import { LogFormat, LogLevel } from '../core/types/config';

const LOG_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  prefix?: string;
  /** Output destination. Defaults to 'console'. */
  output?: 'console' | 'file';
  /** File path when output is 'file'. */
  filePath?: string;
}

export class Logger implements ILogger {
  private readonly options: LoggerOptions;
  private readonly threshold: number;
  private readonly prefix: string;

  /** Set once a file write fails; later lines fall back to the console. */
  private fileFailed = false;

  constructor(options: LoggerOptions) {
    this.options = options;
    this.threshold = LOG_PRIORITY[options.level];
    this.prefix = options.prefix ?? '';

    if (options.output === 'file' && options.filePath) {
      this.ensureDirectory(options.filePath);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, undefined, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, undefined, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.emit('error', message, error, context);
  }

  child(prefix: string): ILogger {
    return new Logger({
      ...this.options,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
    });
  }

  // ── Internal ───────────────────────────────────────────────────────────

  private emit(
    level: LogLevel,
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
  ): void {
    if (LOG_PRIORITY[level] < this.threshold) return;

    const line = this.options.format === 'json'
      ? this.formatJson(level, message, error, context)
      : this.formatText(level, message, error, context);

    this.write(level, line);
  }

  private formatJson(
    level: LogLevel,
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
  ): string {
    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
    };
    if (this.prefix) entry.module = this.prefix;
    entry.message = message;
    if (context && Object.keys(context).length > 0) entry.context = context;
    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    }
    return JSON.stringify(entry);
  }

  private formatText(
    level: LogLevel,
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
  ): string {
    const tag = level.toUpperCase().padEnd(5);
    const modulePart = this.prefix ? `[${this.prefix}] ` : '';
    let line = `${new Date().toISOString()} ${tag} ${modulePart}${message}`;
    if (context && Object.keys(context).length > 0) {
      line += ` ${JSON.stringify(context)}`;
    }
    if (error) {
      line += `\n  Error: ${error.message}`;
    }
    return line;
  }

  private write(level: LogLevel, line: string): void {
    const { output, filePath } = this.options;
    if (output === 'file' && filePath && !this.fileFailed) {
      try {
        fs.appendFileSync(filePath, line + '\n', 'utf-8');
        return;
      } catch (err) {
        this.fileFailed = true;
        console.error(`[Logger] Failed to write to "${filePath}": ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }

  private ensureDirectory(filePath: string): void {
    const dir = path.dirname(filePath);
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (err) {
      this.fileFailed = true;
      console.error(`[Logger] Cannot create log directory "${dir}": ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
