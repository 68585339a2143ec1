/**
 * Splits progress text into per-run loss sequences.
 *
 * Iteration lines accumulate into the current run; a summary line
 * appends its value and closes the run. A trailing run without a
 * summary (truncated log) is still kept.
 */

import { NoProgressDataError, type LossSequence, type LossValue, type RunCollection } from '../models/index.js';
import type { LossTransformFn } from '../transform/index.js';
import { createLogger } from '../../shared/utils/index.js';
import { classifyLine } from './line-classifier.js';

const log = createLogger('progress-parser');

export function parseProgress(lines: Iterable<string>, transform: LossTransformFn): RunCollection {
  const runs: LossSequence[] = [];
  let current: LossValue[] = [];
  let ignored = 0;

  const flush = (): void => {
    runs.push(Object.freeze(current));
    current = [];
  };

  for (const line of lines) {
    const classified = classifyLine(line);
    switch (classified.kind) {
      case 'iteration':
        current.push(transform(classified.value));
        break;
      case 'summary':
        current.push(transform(classified.value));
        flush();
        break;
      case 'unrecognized':
        ignored++;
        break;
    }
  }

  if (current.length > 0) {
    log.debug('Input ended without a summary line; keeping partial run', { values: current.length });
    flush();
  }

  if (runs.length === 0) {
    throw new NoProgressDataError();
  }

  log.debug('Parsed progress', { runs: runs.length, ignoredLines: ignored });
  return runs;
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export function parseProgressText(text: string, transform: LossTransformFn): RunCollection {
  return parseProgress(splitLines(text), transform);
}
