// ============================================================================
// Console Colors - ANSI escape codes for terminal output
// ============================================================================

const ansi = {
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[94m',
  cyan: '\x1b[36m',
  red: '\x1b[31m',
  gray: '\x1b[90m',
} as const;

const RESET = '\x1b[0m';

export type ConsoleColor = keyof typeof ansi;

/**
 * `console.log` format strings, one per color: `console.log(consoleColors.red, message)`.
 */
export const consoleColors: Record<ConsoleColor, string> = {
  green: `${ansi.green}%s${RESET}`,
  yellow: `${ansi.yellow}%s${RESET}`,
  blue: `${ansi.blue}%s${RESET}`,
  cyan: `${ansi.cyan}%s${RESET}`,
  red: `${ansi.red}%s${RESET}`,
  gray: `${ansi.gray}%s${RESET}`,
};
