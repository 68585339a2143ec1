/**
 * Terminal output helpers.
 *
 * Everything goes to stderr: stdout is reserved for data the user
 * asked for (the generated program in dry-run mode).
 */

import chalk from 'chalk';
import { LogManager, type LogLevel } from './LogManager.js';

export { LogManager, type LogLevel } from './LogManager.js';

function write(level: LogLevel, text: string): void {
  if (!LogManager.getInstance().shouldLog(level)) return;
  process.stderr.write(`${text}\n`);
}

export function debug(message: string): void {
  write('debug', chalk.gray(`[DEBUG] ${message}`));
}

export function info(message: string): void {
  write('info', chalk.blue(message));
}

export function success(message: string): void {
  write('info', chalk.green(message));
}

export function warn(message: string): void {
  write('warn', chalk.yellow(`[WARN] ${message}`));
}

export function error(message: string): void {
  write('error', chalk.red(`[ERROR] ${message}`));
}

/** Print a bare line, unaffected by color (paths, machine-readable output) */
export function plain(message: string): void {
  write('info', message);
}
