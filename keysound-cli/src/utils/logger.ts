import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogMetadata = Record<string, unknown>;

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Interface for structured logging.
 */
export interface ILogger {
  /**
   * Log an error message.
   * @param error - Underlying error, its message and stack are merged into the metadata
   */
  error(message: string, error?: Error, meta?: LogMetadata): void;
  warn(message: string, meta?: LogMetadata): void;
  info(message: string, meta?: LogMetadata): void;
  debug(message: string, meta?: LogMetadata): void;

  /**
   * Create a child logger whose lines carry the given context.
   */
  child(context: LogMetadata): ILogger;

  setLevel(level: LogLevel): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export type LogWriter = (line: string) => void;

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.green,
  debug: chalk.gray,
};

/**
 * Terminal logger. Lines go to stderr so the binding table and JSON output on
 * stdout stay readable while sounds play.
 *
 * A `component` in the context becomes the `[component]` scope; any other
 * context fields trail the message as `key=value`.
 */
export class ConsoleLogger implements ILogger {
  private level: LogLevel;

  private static readonly LEVELS: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3
  };

  constructor(
    level: LogLevel = 'info',
    private readonly context: LogMetadata = {},
    private readonly write: LogWriter = (line) => process.stderr.write(`${line}\n`)
  ) {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return ConsoleLogger.LEVELS[level] <= ConsoleLogger.LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, meta?: LogMetadata): string {
    const time = new Date().toISOString().slice(11, 23);
    const { component, ...fields } = this.context;
    const scope = component === undefined ? '' : `${chalk.magenta(`[${String(component)}]`)} `;
    const fieldStr = Object.entries(fields).map(([k, v]) => ` ${k}=${String(v)}`).join('');
    const metaStr = meta && Object.keys(meta).length > 0
      ? ` ${chalk.dim(JSON.stringify(meta))}`
      : '';
    const tag = LEVEL_STYLES[level](level.toUpperCase().padEnd(5));
    return `${chalk.dim(time)} ${tag} ${scope}${message}${fieldStr}${metaStr}`;
  }

  private log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(level)) return;
    this.write(this.formatMessage(level, message, meta));
  }

  error(message: string, error?: Error, meta?: LogMetadata): void {
    this.log('error', message, error ? { ...meta, error: error.message, stack: error.stack } : meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.log('warn', message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.log('info', message, meta);
  }

  debug(message: string, meta?: LogMetadata): void {
    this.log('debug', message, meta);
  }

  child(context: LogMetadata): ILogger {
    return new ConsoleLogger(this.level, { ...this.context, ...context }, this.write);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}
