import fs from 'fs-extra';
import path from 'path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';
export type LogData = Record<string, unknown>;

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

export interface LoggerOptions {
  /** Directory for a `run-<timestamp>.log` file; no file when omitted. */
  logDir?: string;
  console?: boolean;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'INFO'): LogLevel {
  const upper = (value || '').toUpperCase();
  return LOG_LEVELS.find(level => level === upper) ?? fallback;
}

export class Logger {
  private logFile: string | null = null;
  private logLevel: LogLevel;
  private toConsole: boolean;
  private warningCount = 0;
  private errorCount = 0;

  constructor(logLevel: LogLevel = 'INFO', options: LoggerOptions = {}) {
    this.logLevel = logLevel;
    this.toConsole = options.console ?? true;

    if (options.logDir) {
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
      this.logFile = path.join(options.logDir, `run-${timestamp}.log`);
      fs.ensureDirSync(path.dirname(this.logFile));
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.logLevel);
  }

  private formatMessage(level: LogLevel, message: string, data?: LogData): string {
    const timestamp = new Date().toISOString();
    const dataStr = data ? ` | ${JSON.stringify(data, errorReplacer)}` : '';
    return `[${timestamp}] ${level}: ${message}${dataStr}`;
  }

  private writeLog(level: LogLevel, message: string, data?: LogData) {
    if (!this.shouldLog(level)) return;

    const formatted = this.formatMessage(level, message, data);
    if (this.toConsole) {
      if (level === 'ERROR' || level === 'WARN') {
        console.error(formatted);
      } else {
        console.log(formatted);
      }
    }
    if (this.logFile) {
      fs.appendFileSync(this.logFile, formatted + '\n');
    }
  }

  debug(message: string, data?: LogData) {
    this.writeLog('DEBUG', message, data);
  }

  info(message: string, data?: LogData) {
    this.writeLog('INFO', message, data);
  }

  warn(message: string, data?: LogData) {
    this.warningCount++;
    this.writeLog('WARN', message, data);
  }

  error(message: string, data?: LogData) {
    this.errorCount++;
    this.writeLog('ERROR', message, data);
  }

  getStats() {
    return {
      warnings: this.warningCount,
      errors: this.errorCount
    };
  }

  getLogFile(): string | null {
    return this.logFile;
  }
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}
