/**
 * Namespaced loggers for internal diagnostics.
 *
 * Output is filtered by LogManager and written to stderr as
 * `[namespace] message {context}`.
 */

import chalk from 'chalk';
import { LogManager, type LogLevel } from '../ui/LogManager.js';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

function formatContext(context: Record<string, unknown> | undefined): string {
  if (!context || Object.keys(context).length === 0) return '';
  return ` ${JSON.stringify(context)}`;
}

function emit(level: LogLevel, namespace: string, message: string, context?: Record<string, unknown>): void {
  if (!LogManager.getInstance().shouldLog(level)) return;
  const line = `[${namespace}] ${message}${formatContext(context)}`;
  process.stderr.write(`${level === 'error' ? chalk.red(line) : chalk.gray(line)}\n`);
}

export function createLogger(namespace: string): Logger {
  return {
    debug: (message, context) => emit('debug', namespace, message, context),
    info: (message, context) => emit('info', namespace, message, context),
    error: (message, context) => emit('error', namespace, message, context),
  };
}
