/**
 * Reads progress text from files (concatenated in order) or stdin.
 */

import { existsSync, readFileSync } from 'node:fs';
import { createLogger } from '../../shared/utils/index.js';

const log = createLogger('input');

export function readStream(input: NodeJS.ReadableStream): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    input.on('data', (chunk: Buffer | string) => {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
    });
    input.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    input.on('error', reject);
  });
}

export function readInputFiles(files: readonly string[]): string {
  return files
    .map((file) => {
      if (!existsSync(file)) {
        throw new Error(`Input file not found: ${file}`);
      }
      log.debug('Reading input file', { file });
      const text = readFileSync(file, 'utf-8');
      // A file's last line never runs into the next file's first line
      return text.length === 0 || text.endsWith('\n') ? text : `${text}\n`;
    })
    .join('');
}

/** Whole input as one string; stdin is used only when no file is given */
export async function readInputText(files: readonly string[], stdin: NodeJS.ReadableStream = process.stdin): Promise<string> {
  if (files.length > 0) {
    return readInputFiles(files);
  }
  log.debug('Reading progress from stdin');
  return readStream(stdin);
}
