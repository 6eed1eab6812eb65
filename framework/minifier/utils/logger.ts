// ============================================================================
// Unified Logging Utility
// ============================================================================

import { consoleColors, type ConsoleColor } from './colors.js';

export type LogLevel = 'info' | 'warn' | 'error';

interface LogMessage {
  scope: string;
  message: string;
  details?: string;
}

const LEVEL_COLORS: Record<LogLevel, ConsoleColor> = {
  info: 'cyan',
  warn: 'yellow',
  error: 'red',
};

/**
 * Logger shared by the minifier, the pipeline runner and the cache store.
 * Every line is prefixed with the scope that produced it: `[minifier] ...`.
 */
class MinifierLogger {
  private silent = process.env.MINIFIER_SILENT === '1';

  info(scope: string, message: string, details?: string): void {
    this.print('info', { scope, message, details });
  }

  warn(scope: string, message: string, details?: string): void {
    this.print('warn', { scope, message, details });
  }

  /**
   * Log an error message with an optional cause (Error or anything printable)
   */
  error(scope: string, message: string, cause?: unknown): void {
    const details = cause instanceof Error ? cause.message : cause !== undefined ? String(cause) : undefined;
    this.print('error', { scope, message, details });
  }

  /**
   * Suppress all output; `MINIFIER_SILENT=1` sets this at startup
   */
  setSilent(silent: boolean): void {
    this.silent = silent;
  }

  private print(level: LogLevel, { scope, message, details }: LogMessage): void {
    if (this.silent) return;

    const line = details ? `[${scope}] ${message}: ${details}` : `[${scope}] ${message}`;
    console.log(consoleColors[LEVEL_COLORS[level]], line);
  }
}

// Singleton instance
export const logger = new MinifierLogger();
