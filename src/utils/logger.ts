/**
 * RPS Export - Logger
 * ===================
 * Levelled console and file logging for export runs
 */

import * as fs from 'fs';
import * as path from 'path';
import { FileSystemError } from '../core/errors';

// ============================================================================
// LOG LEVELS
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level?: LogLevel;
  console?: boolean;
  /** Colour console output; defaults to whether stdout is a terminal */
  color?: boolean;
  file?: boolean;
  filePath?: string;
}

// ============================================================================
// COLORS FOR TERMINAL
// ============================================================================

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.dim,
  info: COLORS.cyan,
  warn: COLORS.yellow,
  error: COLORS.red,
};

// ============================================================================
// LOGGER CLASS
// ============================================================================

export class Logger {
  private level: LogLevel;
  private enableConsole: boolean;
  private enableColor: boolean;
  private filePath: string | null;
  private fd: number | null = null;

  constructor(options?: LoggerOptions) {
    this.level = options?.level ?? 'info';
    this.enableConsole = options?.console ?? true;
    this.enableColor = options?.color ?? Boolean(process.stdout.isTTY);
    this.filePath = options?.file ? options.filePath ?? null : null;

    if (this.filePath) {
      this.initFileStream(this.filePath);
    }
  }

  /**
   * Open the log file in append mode
   */
  private initFileStream(filePath: string): void {
    const absolutePath = path.resolve(filePath);
    try {
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.fd = fs.openSync(absolutePath, 'a');
    } catch (error) {
      throw new FileSystemError(`Cannot open log file ${absolutePath}`, absolutePath, error);
    }
    this.filePath = absolutePath;
  }

  private writeToFile(line: string): void {
    if (this.fd === null) return;
    try {
      fs.writeSync(this.fd, line);
    } catch (error) {
      throw new FileSystemError(`Cannot write log file ${this.filePath}`, this.filePath ?? '', error);
    }
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatData(data: unknown): string {
    return typeof data === 'object' ? JSON.stringify(data, null, 2) : String(data);
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    let formatted = `[${timestamp}] [${levelStr}] ${message}`;

    if (data !== undefined) {
      formatted += `\n${this.formatData(data)}`;
    }

    return formatted;
  }

  private formatConsoleMessage(level: LogLevel, message: string, data?: unknown): string {
    if (!this.enableColor) {
      return this.formatMessage(level, message, data);
    }

    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    let formatted = `${COLORS.dim}[${timestamp}]${COLORS.reset} ${LEVEL_COLORS[level]}[${levelStr}]${COLORS.reset} ${message}`;

    if (data !== undefined) {
      formatted += `\n${COLORS.dim}${this.formatData(data)}${COLORS.reset}`;
    }

    return formatted;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isLevelEnabled(level)) return;

    if (this.enableConsole) {
      const consoleMsg = this.formatConsoleMessage(level, message, data);
      if (level === 'error') {
        console.error(consoleMsg);
      } else if (level === 'warn') {
        console.warn(consoleMsg);
      } else {
        console.log(consoleMsg);
      }
    }

    this.writeToFile(this.formatMessage(level, message, data) + '\n');
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  /**
   * Close the log file
   */
  close(): void {
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }
}

// ============================================================================
// SINGLETON LOGGER
// ============================================================================

let globalLogger: Logger | null = null;

export function initLogger(options?: LoggerOptions): Logger {
  globalLogger?.close();
  globalLogger = new Logger(options);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}
