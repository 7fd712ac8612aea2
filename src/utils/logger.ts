/**
 * @arch hexgraph.infra.logging
 *
 * Structured logging for the CLI and manifest loading.
 * Diagnostics go to stderr so exported documents on stdout stay parseable.
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

/** Environment variable consulted for the initial level. */
export const LOG_LEVEL_ENV = 'HEXGRAPH_LOG_LEVEL';

/**
 * Minimal write target, satisfied by process.stderr and by test doubles.
 */
export interface LogSink {
  write(chunk: string): unknown;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Resolve a level from an environment value, falling back when unset or unknown.
 */
export function resolveLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

class Logger {
  private level: LogLevel;
  private prefix: string;
  private sink: LogSink;

  constructor(options: { level?: LogLevel; prefix?: string; sink?: LogSink } = {}) {
    this.level = options.level ?? 'info';
    this.prefix = options.prefix ?? '';
    this.sink = options.sink ?? process.stderr;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', chalk.gray, `[DEBUG] ${this.withPrefix(message)}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', chalk.blue, `[INFO] ${this.withPrefix(message)}`, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', chalk.yellow, `[WARN] ${this.withPrefix(message)}`, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.isEnabled('error')) return;
    this.write(chalk.red(`[ERROR] ${this.withPrefix(message)}`));
    if (error instanceof Error) {
      this.write(chalk.red(error.stack ?? error.message));
    } else if (error) {
      this.write(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /**
   * Log a success line (shown at info level).
   */
  success(message: string): void {
    if (!this.isEnabled('info')) return;
    this.write(chalk.green(`✓ ${message}`));
  }

  /**
   * Log a failure line (shown at info level).
   */
  fail(message: string): void {
    if (!this.isEnabled('info')) return;
    this.write(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger sharing level and sink, with a nested prefix.
   */
  child(prefix: string): Logger {
    return new Logger({
      level: this.level,
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      sink: this.sink,
    });
  }

  private withPrefix(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private emit(
    level: LogLevel,
    color: (text: string) => string,
    line: string,
    data?: Record<string, unknown>
  ): void {
    if (!this.isEnabled(level)) return;
    this.write(color(line));
    if (data) {
      this.write(color(JSON.stringify(data, null, 2)));
    }
  }

  private write(line: string): void {
    this.sink.write(`${line}\n`);
  }
}

export const logger = new Logger({ level: resolveLogLevel(process.env[LOG_LEVEL_ENV]) });

export { Logger };
