import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
  commit?: string;
  file?: string;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  colors?: boolean;
  /** Receives each formatted line. Defaults to stderr so stdout stays clean for output. */
  sink?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

const LEVEL_TAGS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'debug',
  info: 'info',
  warn: 'warn',
  error: 'error',
};

class ConsoleLogger implements Logger {
  constructor(
    private readonly options: Required<LoggerOptions>,
    private readonly context: LogContext = {},
  ) {}

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger(this.options, { ...this.context, ...context });
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.options.level]) return;

    const ctx = { ...this.context, ...context };
    const paint = this.options.colors ? LEVEL_COLORS[level] : (s: string) => s;
    const dim = this.options.colors ? chalk.dim : (s: string) => s;

    let prefix = '';
    if (ctx.commit) prefix += dim(`[${ctx.commit.slice(0, 7)}] `);
    if (ctx.file) prefix += dim(`[${ctx.file}] `);

    this.options.sink(`${paint(LEVEL_TAGS[level])} ${prefix}${message}`);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new ConsoleLogger({
    level: options.level ?? 'info',
    colors: options.colors ?? true,
    sink: options.sink ?? (line => console.error(line)),
  });
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
