/**
 * Console logger
 * Diagnostics only; user-facing output is written by the CLI directly
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

interface LogContext {
  [key: string]: unknown;
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  gray: '\x1b[90m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  green: '\x1b[32m',
} as const;

const levelStyles: Record<Exclude<LogLevel, 'silent'>, { color: string; label: string }> = {
  debug: { color: colors.gray, label: 'DEBUG' },
  info: { color: colors.cyan, label: 'INFO' },
  warn: { color: colors.yellow, label: 'WARN' },
  error: { color: colors.red, label: 'ERROR' },
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export class Logger {
  private prefix: string;
  private readonly level: LogLevel;

  constructor(prefix: string = '', level: LogLevel = 'warn') {
    this.prefix = prefix;
    this.level = level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private header(level: Exclude<LogLevel, 'silent'>, message: string): string {
    const timestamp = new Date().toISOString();
    const prefixStr = this.prefix ? `[${this.prefix}] ` : '';
    const { color, label } = levelStyles[level];

    return `${colors.gray}[${timestamp}]${colors.reset} ${color}[${label}]${colors.reset} ${colors.magenta}${prefixStr}${colors.reset}${message}`;
  }

  private formatMessage(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): string {
    const contextStr = context ? `\n${colors.green}${JSON.stringify(context, null, 2)}${colors.reset}` : '';
    return this.header(level, message) + contextStr;
  }

  debug(message: string, context?: LogContext): void {
    if (!this.isEnabled('debug')) return;
    console.debug(this.formatMessage('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.isEnabled('info')) return;
    console.info(this.formatMessage('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.isEnabled('warn')) return;
    console.warn(this.formatMessage('warn', message, context));
  }

  private formatError(error: Error | unknown): string {
    if (!(error instanceof Error)) {
      return `\n${colors.red}Error details:${colors.reset}\n${JSON.stringify(error, null, 2)}`;
    }

    let output = `\n${colors.red}${error.name}: ${error.message}${colors.reset}`;

    // Skip the first stack line, it repeats the message
    if (error.stack) {
      const stackLines = error.stack.split('\n').slice(1);
      output += `\n${colors.gray}${stackLines.join('\n')}${colors.reset}`;
    }

    if ('cause' in error && error.cause) {
      output += `\n\n${colors.yellow}Caused by:${colors.reset}`;
      output += this.formatError(error.cause);
    }

    return output;
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    if (!this.isEnabled('error')) return;

    let output = this.header('error', message);

    // Merge context with ExtendedError details if present
    let mergedContext = { ...context };
    if (
      error &&
      typeof error === 'object' &&
      'details' in error &&
      typeof error.details === 'object' &&
      error.details !== null
    ) {
      mergedContext = {
        ...mergedContext,
        ...error.details,
      };
    }

    if (Object.keys(mergedContext).length > 0) {
      output += `\n${colors.green}Context:${colors.reset}\n${JSON.stringify(mergedContext, null, 2)}`;
    }

    if (error) {
      output += this.formatError(error);
    }

    console.error(output);
  }

  /**
   * Create a child logger with a specific prefix
   */
  child(prefix: string): Logger {
    const childPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new Logger(childPrefix, this.level);
  }
}

export const logger = new Logger();

export function createLogger(prefix: string, level?: LogLevel): Logger {
  return new Logger(prefix, level);
}
