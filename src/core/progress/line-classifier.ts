/**
 * Classifies a single progress-log line.
 *
 * Two rules are tried in order: a per-iteration line starts with a
 * decimal number, a run summary reads `average loss = <number>`.
 * Anything else (headers, blank lines, option dumps) is unrecognized.
 */

import type { LossValue } from '../models/index.js';

export type ProgressLine =
  | { kind: 'iteration'; value: LossValue }
  | { kind: 'summary'; value: LossValue }
  | { kind: 'unrecognized' };

interface LineRule {
  kind: 'iteration' | 'summary';
  pattern: RegExp;
}

const LINE_RULES: readonly LineRule[] = [
  { kind: 'iteration', pattern: /^([0-9.]+)/ },
  { kind: 'summary', pattern: /^average loss\s*=\s*([0-9.]+)/ },
];

const UNRECOGNIZED: ProgressLine = { kind: 'unrecognized' };

/** `[0-9.]+` also matches tokens like `...`; those carry no value */
function parseToken(token: string | undefined): LossValue | null {
  if (!token) return null;
  const value = Number.parseFloat(token);
  return Number.isFinite(value) ? value : null;
}

export function classifyLine(line: string): ProgressLine {
  for (const { kind, pattern } of LINE_RULES) {
    const match = line.match(pattern);
    if (!match) continue;
    const value = parseToken(match[1]);
    if (value === null) return UNRECOGNIZED;
    return { kind, value };
  }
  return UNRECOGNIZED;
}
