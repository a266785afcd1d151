import chalk from 'chalk';
import type { CommandLogger } from '../logger.js';

export const EXIT_FAILED = 1;
export const EXIT_LOAD_ERROR = 2;

/**
 * Log the error, print it and exit
 */
export function fail(log: CommandLogger, context: string, error: unknown, code: number): never {
  const message = error instanceof Error ? error.message : String(error);
  log.error(context, error);
  console.log(chalk.red(`\n  Error: ${message.split('\n').join('\n  ')}\n`));
  process.exit(code);
}
