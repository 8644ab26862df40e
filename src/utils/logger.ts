import chalk from 'chalk';
import type { Logger, Severity } from '../types/index.js';

const ICONS = {
  success: '✓',
  warning: '⚠',
  error: '✗',
  info: 'ℹ',
  debug: '•',
} as const;

/**
 * Create a logger with colored console output
 */
export function createLogger(verbose = false): Logger {
  return {
    info(message: string): void {
      console.log(chalk.blue(`${ICONS.info} ${message}`));
    },

    success(message: string): void {
      console.log(chalk.green(`${ICONS.success} ${message}`));
    },

    warn(message: string): void {
      console.log(chalk.yellow(`${ICONS.warning} ${message}`));
    },

    error(message: string): void {
      console.error(chalk.red(`${ICONS.error} ${message}`));
    },

    debug(message: string): void {
      if (verbose) {
        console.log(chalk.gray(`${ICONS.debug} ${message}`));
      }
    },

    log(message: string): void {
      console.log(message);
    },
  };
}

/**
 * Logger that discards everything (used for --json output and as the engine default)
 */
export function createSilentLogger(): Logger {
  const noop = (): void => {};
  return { info: noop, success: noop, warn: noop, error: noop, debug: noop, log: noop };
}

/**
 * Format a list of items for display
 */
export function formatList(items: string[], indent = 2): string {
  const spaces = ' '.repeat(indent);
  return items.map((item) => `${spaces}- ${item}`).join('\n');
}

/**
 * Format a header for section output
 */
export function formatHeader(title: string): string {
  return chalk.bold.underline(`\n${title}\n`);
}

/**
 * Format a key-value pair for display
 */
export function formatKeyValue(key: string, value: string): string {
  return `${chalk.cyan(key)}: ${value}`;
}

/**
 * Color a severity label
 */
export function formatSeverity(severity: Severity): string {
  switch (severity) {
    case 'critical':
    case 'error':
      return chalk.red(severity);
    case 'warning':
      return chalk.yellow(severity);
    case 'info':
      return chalk.blue(severity);
  }
}
