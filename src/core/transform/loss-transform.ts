/**
 * Loss value transforms.
 *
 * One mode is chosen per invocation and applied to every value the
 * progress parser extracts.
 */

import { InvalidLossValueError, type LossValue, type TransformMode } from '../models/index.js';

export type LossTransformFn = (raw: LossValue) => LossValue;

function assertValidLoss(raw: LossValue): void {
  if (!Number.isFinite(raw) || raw < 0) {
    throw new InvalidLossValueError(raw);
  }
}

function applyMode(raw: LossValue, mode: TransformMode): LossValue {
  switch (mode) {
    case 'identity':
      return raw;
    case 'sqrt':
      return Math.sqrt(raw);
    case 'log-squared-percent':
      return (Math.exp(Math.sqrt(raw)) - 1.0) * 100;
  }
}

export function transformLoss(raw: LossValue, mode: TransformMode): LossValue {
  assertValidLoss(raw);
  const transformed = applyMode(raw, mode);
  // e^√raw exceeds the double range above raw ≈ 5.04e5
  if (!Number.isFinite(transformed)) {
    throw new InvalidLossValueError(raw, `${mode} transform overflows`);
  }
  return transformed;
}

/** Bind a mode once so callers never re-select it per value */
export function createLossTransform(mode: TransformMode): LossTransformFn {
  return (raw) => transformLoss(raw, mode);
}

/** Percent mode changes the metric name shown in labels and the legend */
export function isPercentMode(mode: TransformMode): boolean {
  return mode === 'log-squared-percent';
}
