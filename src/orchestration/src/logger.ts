/**
 * Logger module for tracking ingestion and query runs
 * Logs to both console and file with timestamps and log levels
 */

import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.SUCCESS]: 2,
  [LogLevel.WARN]: 3,
  [LogLevel.ERROR]: 4
};

/**
 * Parse a LOG_LEVEL value. `silent` (or `none`) turns logging off entirely.
 */
export function parseLogLevel(value: string | undefined): LogLevel | 'silent' {
  const normalized = (value || '').trim().toUpperCase();
  if (normalized === 'SILENT' || normalized === 'NONE') {
    return 'silent';
  }
  const match = Object.values(LogLevel).find(level => level === normalized);
  return match ?? LogLevel.DEBUG;
}

export class Logger {
  private logDirectory: string;
  private logFilePath: string;
  private logStream: fs.WriteStream | null = null;
  private threshold: LogLevel | 'silent';

  constructor(
    logDirectory: string = process.env.LOG_DIR || './logs',
    threshold: LogLevel | 'silent' = parseLogLevel(process.env.LOG_LEVEL)
  ) {
    this.logDirectory = logDirectory;
    this.threshold = threshold;

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logFilePath = path.join(logDirectory, `agri-qa-${timestamp}.log`);
  }

  /**
   * Open the log file on first write
   */
  private stream(): fs.WriteStream {
    if (!this.logStream) {
      if (!fs.existsSync(this.logDirectory)) {
        fs.mkdirSync(this.logDirectory, { recursive: true });
      }
      this.logStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
    }
    return this.logStream;
  }

  private enabled(level: LogLevel): boolean {
    return this.threshold !== 'silent' && LEVEL_ORDER[level] >= LEVEL_ORDER[this.threshold];
  }

  /**
   * Main logging method
   */
  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.enabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const logMessage = `[${timestamp}] [${level}] ${message}`;

    const out = this.stream();
    out.write(logMessage + '\n');

    if (data !== undefined) {
      out.write(`  Data: ${formatData(data)}\n`);
      if (data instanceof Error && data.stack) {
        out.write(`  Stack: ${data.stack}\n`);
      }
    }

    console.log(`[${level}] ${message}`);

    if (data !== undefined) {
      console.log('  Data:', data instanceof Error ? data.message : data);
    }
  }

  /**
   * Log debug information
   */
  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  /**
   * Log progress messages
   */
  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  /**
   * Log warnings, such as a skipped document or missing weather
   */
  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  /**
   * Log errors; an Error passed as data is written with its stack
   */
  error(message: string, error?: unknown): void {
    this.log(LogLevel.ERROR, message, error);
  }

  /**
   * Log success messages
   */
  success(message: string, data?: unknown): void {
    this.log(LogLevel.SUCCESS, message, data);
  }

  /**
   * Log separator line for readability
   */
  separator(char: string = '=', length: number = 80): void {
    if (!this.enabled(LogLevel.INFO)) {
      return;
    }
    const line = char.repeat(length);
    this.stream().write(line + '\n');
    console.log(line);
  }

  /**
   * Log section header
   */
  section(title: string): void {
    this.separator('=');
    this.info(title);
    this.separator('=');
  }

  /**
   * Close the log stream
   */
  close(): void {
    if (this.logStream) {
      this.info('Logger closing');
      this.logStream.end();
      this.logStream = null;
    }
  }

  /**
   * Get the log file path
   */
  getLogFilePath(): string {
    return this.logFilePath;
  }
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return `${data.name}: ${data.message}`;
  }
  if (typeof data === 'object' && data !== null) {
    return JSON.stringify(data, null, 2);
  }
  return String(data);
}

// Export singleton instance
export const logger = new Logger();
