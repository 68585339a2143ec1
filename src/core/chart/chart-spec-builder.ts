/**
 * Builds the chart description for a set of runs.
 *
 * The first series carries the axes, title and grid; every later
 * series is overlaid on the same axes. Each legend entry is the last
 * value of its series.
 */

import {
  NoProgressDataError,
  type AxisRange,
  type ChartSeries,
  type ChartSpec,
  type LossSequence,
  type RunCollection,
  type StyleConfig,
  type TransformMode,
} from '../models/index.js';
import { isPercentMode } from '../transform/index.js';
import { paletteColor, SERIES_MARKER, SERIES_PALETTE } from './palette.js';

const LEGEND_DECIMALS = 4;
const LEGEND_INSET = 0.02;

export function legendEntry(sequence: LossSequence): string {
  const last = sequence[sequence.length - 1];
  if (last === undefined) {
    throw new NoProgressDataError();
  }
  return last.toFixed(LEGEND_DECIMALS);
}

export function legendTitle(mode: TransformMode): string {
  return isPercentMode(mode) ? '%loss' : 'loss';
}

function computeYRange(runs: RunCollection): AxisRange {
  let min = Infinity;
  let max = -Infinity;
  for (const run of runs) {
    for (const value of run) {
      if (value < min) min = value;
      if (value > max) max = value;
    }
  }
  return { min, max };
}

function computeXRange(runs: RunCollection): AxisRange {
  return { min: 1, max: Math.max(...runs.map((run) => run.length)) };
}

export function buildChartSpec(runs: RunCollection, style: StyleConfig, mode: TransformMode): ChartSpec {
  if (runs.length === 0) {
    throw new NoProgressDataError();
  }

  const series: ChartSeries[] = runs.map((data, index) => ({
    data,
    colorIndex: index % SERIES_PALETTE.length,
    color: paletteColor(index),
    marker: SERIES_MARKER,
  }));

  return {
    xLabel: style.xLabel,
    yLabel: style.yLabel,
    title: style.title,
    width: style.width,
    height: style.height,
    grid: true,
    xRange: computeXRange(runs),
    yRange: computeYRange(runs),
    series,
    legend: {
      title: legendTitle(mode),
      entries: runs.map(legendEntry),
      colors: series.map((s) => s.color),
      markers: series.map((s) => s.marker),
      position: 'topright',
      inset: LEGEND_INSET,
    },
  };
}
