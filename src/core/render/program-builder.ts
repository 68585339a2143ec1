/**
 * Generates the R program that draws a ChartSpec.
 *
 * Statement order: device open, plot() for the first series (axes,
 * title, grid), lines() per remaining series, legend(), dev.off().
 */

import type { ChartSeries, ChartSpec, RenderTarget } from '../models/index.js';

/** Postscript sizes are in inches */
const POSTSCRIPT_DPI = 72;

export interface RenderProgramOptions {
  /** Use the Cairo PNG device when the package is installed */
  pngBackendAvailable: boolean;
}

export function rString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}

export function rNumber(value: number): string {
  return String(value);
}

function rNumbers(values: readonly number[]): string {
  return `c(${values.map(rNumber).join(', ')})`;
}

function rStrings(values: readonly string[]): string {
  return `c(${values.map(rString).join(', ')})`;
}

function inches(pixels: number): string {
  return rNumber(Number((pixels / POSTSCRIPT_DPI).toFixed(4)));
}

export function buildDeviceStatements(spec: ChartSpec, target: RenderTarget, options: RenderProgramOptions): string[] {
  const file = rString(target.path);
  const width = rNumber(spec.width);
  const height = rNumber(spec.height);

  switch (target.device) {
    case 'postscript':
      return [
        `postscript(file=${file}, width=${inches(spec.width)}, height=${inches(spec.height)}, horizontal=FALSE, paper="special")`,
      ];
    case 'jpeg':
      return [`jpeg(filename=${file}, width=${width}, height=${height})`];
    case 'png':
      if (options.pngBackendAvailable) {
        return [
          'suppressPackageStartupMessages(library(Cairo))',
          `CairoPNG(filename=${file}, width=${width}, height=${height})`,
        ];
      }
      return [`png(filename=${file}, width=${width}, height=${height})`];
  }
}

function seriesArgs(series: ChartSeries): string {
  return `${rNumbers(series.data)}, type="o", col=${rString(series.color)}, pch=${rNumber(series.marker)}`;
}

function plotStatement(spec: ChartSpec, first: ChartSeries): string {
  const { xRange, yRange } = spec;
  return [
    `plot(${seriesArgs(first)}`,
    `xlim=${rNumbers([xRange.min, xRange.max])}`,
    `ylim=${rNumbers([yRange.min, yRange.max])}`,
    `xlab=${rString(spec.xLabel)}`,
    `ylab=${rString(spec.yLabel)}`,
    `main=${rString(spec.title)})`,
  ].join(', ');
}

function legendStatement(spec: ChartSpec): string {
  const { legend } = spec;
  return [
    `legend(${rString(legend.position)}`,
    `inset=${rNumber(legend.inset)}`,
    `title=${rString(legend.title)}`,
    `legend=${rStrings(legend.entries)}`,
    `col=${rStrings(legend.colors)}`,
    `pch=${rNumbers(legend.markers)})`,
  ].join(', ');
}

export function buildRenderProgram(spec: ChartSpec, target: RenderTarget, options: RenderProgramOptions): string {
  const [first, ...rest] = spec.series;
  if (!first) {
    throw new Error('Chart has no series');
  }

  const statements = [
    ...buildDeviceStatements(spec, target, options),
    plotStatement(spec, first),
    ...(spec.grid ? ['grid()'] : []),
    ...rest.map((series) => `lines(${seriesArgs(series)})`),
    legendStatement(spec),
    'invisible(dev.off())',
  ];
  return `${statements.join('\n')}\n`;
}
