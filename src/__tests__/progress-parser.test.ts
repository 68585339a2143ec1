/**
 * Tests for splitting progress logs into runs
 */

import { describe, it, expect } from 'vitest';
import { parseProgress, parseProgressText } from '../core/progress/index.js';
import { createLossTransform } from '../core/transform/index.js';
import { NoProgressDataError } from '../core/models/index.js';

const identity = createLossTransform('identity');

describe('parseProgressText', () => {
  it('should split runs on summary lines', () => {
    const runs = parseProgressText('0.5\n0.3\naverage loss = 0.2\n0.9\naverage loss = 0.1\n', identity);

    expect(runs).toEqual([[0.5, 0.3, 0.2], [0.9, 0.1]]);
  });

  it('should keep a trailing run without a summary line', () => {
    expect(parseProgressText('0.4\n0.2\n', identity)).toEqual([[0.4, 0.2]]);
  });

  it('should keep a partial run after a completed one', () => {
    expect(parseProgressText('0.5\naverage loss = 0.4\n0.9\n0.8', identity)).toEqual([[0.5, 0.4], [0.9, 0.8]]);
  });

  it('should treat a lone summary line as a run', () => {
    expect(parseProgressText('average loss = 0.7\n', identity)).toEqual([[0.7]]);
  });

  it('should extract a full training log and skip everything else', () => {
    const log = [
      'Num weight bits = 18',
      'learning rate = 0.5',
      'average  since         example        example  current  current  current',
      'loss     last          counter         weight    label  predict features',
      '0.693147 0.693147            1            1.0  -1.0000   0.0000       15',
      '0.420000 0.146853            2            2.0   1.0000   0.8633       15',
      '',
      'finished run',
      'number of examples = 4',
      'weighted example sum = 4.000000',
      'average loss = 0.310000',
      'total feature number = 60',
    ].join('\n');

    expect(parseProgressText(log, identity)).toEqual([[0.693147, 0.42, 0.31]]);
  });

  it('should handle CRLF line endings', () => {
    expect(parseProgressText('0.5\r\naverage loss = 0.2\r\n', identity)).toEqual([[0.5, 0.2]]);
  });

  it('should apply the transform to every value including the summary', () => {
    const runs = parseProgressText('0.25\n1\naverage loss = 4\n', createLossTransform('sqrt'));

    expect(runs).toEqual([[0.5, 1, 2]]);
  });

  it('should throw NoProgressDataError when nothing is recognized', () => {
    expect(() => parseProgressText('hello\nworld\n', identity)).toThrow(NoProgressDataError);
    expect(() => parseProgressText('', identity)).toThrow('No progress data found in input');
  });
});

describe('parseProgress', () => {
  it('should accept any iterable of lines', () => {
    function* lines(): Generator<string> {
      yield '0.9';
      yield 'average loss = 0.8';
    }

    expect(parseProgress(lines(), identity)).toEqual([[0.9, 0.8]]);
  });

  it('should freeze every produced sequence', () => {
    const runs = parseProgress(['0.5', 'average loss = 0.2', '0.4'], identity);

    expect(runs).toHaveLength(2);
    for (const run of runs) {
      expect(Object.isFrozen(run)).toBe(true);
    }
  });
});
