/**
 * CLI logging utilities
 * Everything goes to stderr; stdout carries only the resource document
 */

import chalk from 'chalk';

/**
 * Log error message
 */
export function error(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Log verbose message (only in verbose mode)
 */
export function verbose(message: string, isVerbose: boolean = false): void {
  if (isVerbose) {
    console.error(chalk.gray('[verbose]'), message);
  }
}
