/**
 * Core data model shared by the parsing, charting and rendering stages.
 */

/** A finite, non-negative loss value (raw or transformed) */
export type LossValue = number;

/** Loss values of one run, in the order they were logged */
export type LossSequence = readonly LossValue[];

/** One sequence per detected run, in detection order. Never contains an empty sequence. */
export type RunCollection = readonly LossSequence[];

export const TRANSFORM_MODES = ['identity', 'sqrt', 'log-squared-percent'] as const;

/**
 * Numeric transform applied to every extracted loss value.
 * - identity: plotted as logged
 * - sqrt: square root of a squared-error loss
 * - log-squared-percent: (e^√loss − 1) × 100
 */
export type TransformMode = typeof TRANSFORM_MODES[number];

/** Labels and dimensions chosen once at startup */
export interface StyleConfig {
  readonly xLabel: string;
  readonly yLabel: string;
  readonly title: string;
  readonly width: number;
  readonly height: number;
}

export interface ChartSeries {
  readonly data: LossSequence;
  readonly colorIndex: number;
  readonly color: string;
  readonly marker: number;
}

export type LegendPosition = 'topright';

export interface ChartLegend {
  readonly title: string;
  /** Final value of each series, fixed to 4 decimals */
  readonly entries: readonly string[];
  readonly colors: readonly string[];
  readonly markers: readonly number[];
  readonly position: LegendPosition;
  readonly inset: number;
}

export interface AxisRange {
  readonly min: number;
  readonly max: number;
}

/** Backend-agnostic description of the overlaid convergence chart */
export interface ChartSpec {
  readonly xLabel: string;
  readonly yLabel: string;
  readonly title: string;
  readonly width: number;
  readonly height: number;
  readonly grid: boolean;
  /** Shared ranges so overlaid series are never clipped by the first one */
  readonly xRange: AxisRange;
  readonly yRange: AxisRange;
  readonly series: readonly ChartSeries[];
  readonly legend: ChartLegend;
}

export type DeviceKind = 'postscript' | 'jpeg' | 'png';

export interface RenderTarget {
  readonly path: string;
  readonly device: DeviceKind;
  /** True when the path is the tool's own temp file rather than one the user named */
  readonly isDefault: boolean;
}
