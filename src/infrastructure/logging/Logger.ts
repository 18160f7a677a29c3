import { writeFileSync, appendFileSync, existsSync, mkdirSync, statSync, renameSync, unlinkSync, readdirSync } from 'fs';
import { basename, dirname, join } from 'path';

import { ILogger } from '../../core/repositories/ILogger.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Logger for the bot
 * Writes to stderr and an optional log file
 */
export class Logger implements ILogger {
  private logFilePath: string | null = null;
  private logLevel: LogLevel;
  private maxLogSizeBytes: number = 10 * 1024 * 1024; // 10MB default
  private maxRotatedLogs: number = 5; // Keep last 5 rotated logs

  constructor(logLevel: LogLevel = 'info', logFilePath?: string) {
    this.logLevel = logLevel;

    if (logFilePath) {
      this.initializeLogFile(logFilePath);
    }
  }

  /**
   * Initialize log file with rotation
   */
  private initializeLogFile(logFilePath: string): void {
    try {
      const logDir = dirname(logFilePath);

      if (!existsSync(logDir)) {
        mkdirSync(logDir, { recursive: true });
      }

      this.logFilePath = logFilePath;

      this.rotateLogIfNeeded();
      this.cleanupOldRotatedLogs();

      const header = `\n${'='.repeat(80)}\nTicket Bot Log - ${new Date().toISOString()}\n${'='.repeat(80)}\n`;
      writeFileSync(this.logFilePath, header, { flag: 'a' });

      this.info(`Logging initialized: ${this.logFilePath}`);
    } catch (error) {
      this.logFilePath = null;
      this.error('Failed to initialize log file', error);
    }
  }

  /**
   * Rotate log file if it exceeds max size
   */
  private rotateLogIfNeeded(): void {
    if (!this.logFilePath || !existsSync(this.logFilePath)) {
      return;
    }

    const stats = statSync(this.logFilePath);
    if (stats.size > this.maxLogSizeBytes) {
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      renameSync(this.logFilePath, `${this.logFilePath}.${timestamp}`);
    }
  }

  /**
   * Keeps only the most recent N rotated logs
   */
  private cleanupOldRotatedLogs(): void {
    if (!this.logFilePath) {
      return;
    }

    const logDir = dirname(this.logFilePath);
    const logFileName = basename(this.logFilePath);

    const rotatedLogs = readdirSync(logDir)
      .filter(f => f.startsWith(logFileName + '.'))
      .map(f => ({
        path: join(logDir, f),
        mtime: statSync(join(logDir, f)).mtime.getTime()
      }))
      .sort((a, b) => b.mtime - a.mtime); // newest first

    for (const log of rotatedLogs.slice(this.maxRotatedLogs)) {
      unlinkSync(log.path);
    }
  }

  debug(message: string, meta?: unknown): void {
    if (!this.shouldLog('debug')) return;
    this.log('DEBUG', message, meta);
  }

  info(message: string, meta?: unknown): void {
    if (!this.shouldLog('info')) return;
    this.log('INFO', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    if (!this.shouldLog('warn')) return;
    this.log('WARN', message, meta);
  }

  error(message: string, meta?: unknown): void {
    if (!this.shouldLog('error')) return;
    this.log('ERROR', message, meta);
  }

  /**
   * Core logging function
   */
  private log(level: string, message: string, meta?: unknown): void {
    const formattedMessage = this.formatMessage(new Date().toISOString(), level, message, meta);

    process.stderr.write(formattedMessage + '\n');

    if (this.logFilePath) {
      try {
        appendFileSync(this.logFilePath, formattedMessage + '\n');
      } catch (error) {
        // Stop writing to a broken file instead of failing every call
        this.logFilePath = null;
        process.stderr.write(`[Logger] Disabled file logging: ${error instanceof Error ? error.message : String(error)}\n`);
      }
    }
  }

  /**
   * Format log message
   */
  formatMessage(timestamp: string, level: string, message: string, meta?: unknown): string {
    let formatted = `[${timestamp}] [${level.padEnd(5)}] ${message}`;

    if (meta !== undefined) {
      if (typeof meta === 'object' && meta !== null) {
        formatted += '\n' + JSON.stringify(meta, errorReplacer, 2);
      } else {
        formatted += ` ${String(meta)}`;
      }
    }

    return formatted;
  }

  /**
   * Check if should log based on level
   */
  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  /**
   * Create a child logger with prefix
   */
  child(prefix: string): ChildLogger {
    return new ChildLogger(this, prefix);
  }
}

/**
 * Child logger with prefix
 */
export class ChildLogger implements ILogger {
  constructor(
    private parent: ILogger,
    private prefix: string
  ) {}

  debug(message: string, meta?: unknown): void {
    this.parent.debug(`[${this.prefix}] ${message}`, meta);
  }

  info(message: string, meta?: unknown): void {
    this.parent.info(`[${this.prefix}] ${message}`, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.parent.warn(`[${this.prefix}] ${message}`, meta);
  }

  error(message: string, meta?: unknown): void {
    this.parent.error(`[${this.prefix}] ${message}`, meta);
  }
}

/**
 * Errors have no enumerable fields, so JSON.stringify would print {}
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}
