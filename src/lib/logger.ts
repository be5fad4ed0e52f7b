/**
 * Logger for hpcstack
 *
 * Progress channel of the lifecycle controller. Supports human-readable
 * and JSON output modes; in JSON mode nothing is written, so the command
 * result stays the only thing on stdout.
 */

import type { ClusterError } from '../core/errors.js';

/**
 * Output mode for the logger
 */
export type OutputMode = 'human' | 'json';

/**
 * Log level for messages
 */
export type LogLevel = 'debug' | 'info' | 'success' | 'warning' | 'error';

/**
 * Where log lines go. Defaults to the console.
 */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface LoggerOptions {
  mode?: OutputMode;
  /** Also print debug messages (collaborator calls) */
  verbose?: boolean;
  sink?: LogSink;
}

/**
 * Logger class supporting human-readable and JSON output modes.
 *
 * Human mode outputs text with symbols.
 */
export class Logger {
  private readonly mode: OutputMode;
  private readonly verbose: boolean;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.mode = options.mode ?? 'human';
    this.verbose = options.verbose ?? false;
    this.sink = options.sink ?? consoleSink;
  }

  private write(level: LogLevel, text: string): void {
    if (this.mode !== 'human') {
      return;
    }
    if (level === 'error' || level === 'warning') {
      this.sink.err(text);
    } else {
      this.sink.out(text);
    }
  }

  /**
   * Log a success message.
   */
  success(message: string): void {
    this.write('success', `✓ ${message}`);
  }

  /**
   * Log an error message.
   */
  error(message: string, error?: ClusterError): void {
    this.write('error', `✗ ${message}`);
    if (error?.suggestion) {
      this.write('error', `  Fix: ${error.suggestion}`);
    }
  }

  /**
   * Log an info message.
   */
  info(message: string): void {
    this.write('info', message);
  }

  /**
   * Log a warning message.
   */
  warning(message: string): void {
    this.write('warning', `⚠ ${message}`);
  }

  /**
   * Log an action being performed.
   */
  action(description: string, symbol: string = '→'): void {
    this.write('info', `${symbol} ${description}`);
  }

  /**
   * Log a detail shown only in verbose mode.
   */
  debug(message: string): void {
    if (this.verbose) {
      this.write('debug', `  ${message}`);
    }
  }
}

/**
 * Global logger instance.
 *
 * Can be replaced with a configured instance for different output modes.
 */
export let logger = new Logger();

/**
 * Create and set a new logger with the specified mode.
 */
export function configureLogger(mode: OutputMode, verbose: boolean = false): Logger {
  logger = new Logger({ mode, verbose });
  return logger;
}
