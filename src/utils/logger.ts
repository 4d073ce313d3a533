/**
 * Leveled console logging for the CLI and the checker's progress output.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    console.log(chalk.gray(`[DEBUG] ${this.formatMessage(message)}`));
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.blue(`[INFO] ${this.formatMessage(message)}`));
    if (data) {
      console.log(chalk.blue(JSON.stringify(data, null, 2)));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    console.warn(chalk.yellow(`[WARN] ${this.formatMessage(message)}`));
    if (data) {
      console.warn(chalk.yellow(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(`[ERROR] ${this.formatMessage(message)}`));
    if (error) {
      if (error instanceof Error) {
        console.error(chalk.red(error.stack || error.message));
      } else {
        console.error(chalk.red(JSON.stringify(error, null, 2)));
      }
    }
  }

  /**
   * Log a success message (shown unless silent or above info).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  fail(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger with a prefix. The child inherits the current level.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
