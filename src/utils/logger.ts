import chalk from 'chalk';

import { APP_NAME } from '../constants';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

type Label = (text: string) => string;

const LABELS: Record<Exclude<LogLevel, LogLevel.SILENT>, [string, Label]> = {
  [LogLevel.DEBUG]: ['DEBUG', chalk.dim],
  [LogLevel.INFO]: ['INFO', chalk.blue],
  [LogLevel.WARN]: ['WARN', chalk.yellow],
  [LogLevel.ERROR]: ['ERROR', chalk.red],
};

/**
 * Diagnostics for the helper.
 *
 * Git passes the helper's stderr through to the terminal and reads the
 * answer from stdout, so every level writes to stderr and each line names
 * the helper it came from.
 */
class Logger {
  private level: LogLevel = LogLevel.WARN;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isDebugEnabled(): boolean {
    return this.level <= LogLevel.DEBUG;
  }

  debug(...args: unknown[]): void {
    this.write(LogLevel.DEBUG, args);
  }

  info(...args: unknown[]): void {
    this.write(LogLevel.INFO, args);
  }

  warn(...args: unknown[]): void {
    this.write(LogLevel.WARN, args);
  }

  error(...args: unknown[]): void {
    this.write(LogLevel.ERROR, args);
  }

  private write(level: Exclude<LogLevel, LogLevel.SILENT>, args: unknown[]): void {
    if (this.level > level) {
      return;
    }
    const [name, color] = LABELS[level];
    console.error(color(`[${APP_NAME}] [${name}]`), ...args);
  }
}

export const logger = new Logger();

// Enable debug logging if DEBUG env var is set
if (process.env.DEBUG) {
  logger.setLevel(LogLevel.DEBUG);
}
