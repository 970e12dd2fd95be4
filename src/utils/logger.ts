/**
 * Leveled console logger.
 *
 * Child loggers add a component prefix and share their root's level, so
 * one setLevel() call on the root covers every component.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type Severity = Exclude<LogLevel, 'silent'>;

const RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface Channel {
  tag: string;
  color: 'gray' | 'blue' | 'yellow' | 'red';
  write: (line: string) => void;
}

const CHANNELS: Record<Severity, Channel> = {
  debug: { tag: '[DEBUG]', color: 'gray', write: line => console.log(line) },
  info: { tag: '[INFO]', color: 'blue', write: line => console.log(line) },
  warn: { tag: '[WARN]', color: 'yellow', write: line => console.warn(line) },
  error: { tag: '[ERROR]', color: 'red', write: line => console.error(line) },
};

class Logger {
  constructor(
    private readonly shared: { level: LogLevel } = { level: 'info' },
    private readonly prefix = ''
  ) {}

  setLevel(level: LogLevel): void {
    this.shared.level = level;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.emit('error', message, data);
  }

  /**
   * Unprefixed confirmation line for CLI output, shown at info level.
   */
  success(message: string): void {
    if (!this.enabled('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  child(prefix: string): Logger {
    return new Logger(this.shared, this.prefix ? `${this.prefix}:${prefix}` : prefix);
  }

  private enabled(severity: Severity): boolean {
    return RANK[severity] >= RANK[this.shared.level];
  }

  private emit(severity: Severity, message: string, data?: Record<string, unknown>): void {
    if (!this.enabled(severity)) return;

    const { tag, color, write } = CHANNELS[severity];
    const text = this.prefix ? `[${this.prefix}] ${message}` : message;
    write(chalk[color](`${tag} ${text}`));
    if (data) {
      write(chalk[color](JSON.stringify(data, null, 2)));
    }
  }
}

export const logger = new Logger();

export { Logger };
