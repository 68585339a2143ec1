/**
 * Plot pipeline
 *
 * text → runs → chart spec → rendered file → viewer.
 * Every stage finishes before the next one starts.
 */

import type { RenderTarget, RunCollection, StyleConfig, TransformMode } from '../../core/models/index.js';
import { buildChartSpec } from '../../core/chart/index.js';
import { parseProgress } from '../../core/progress/index.js';
import { buildRenderProgram } from '../../core/render/index.js';
import { createLossTransform } from '../../core/transform/index.js';
import type { Renderer } from '../../infra/renderer/index.js';
import type { Viewer } from '../../infra/viewer/index.js';
import { createLogger } from '../../shared/utils/index.js';
import { dispatchChart } from './dispatcher.js';
import type { OutputFileSystem } from './output-fs.js';
import { presentChart } from './presenter.js';

const log = createLogger('pipeline');

export interface PlotOptions {
  readonly transform: TransformMode;
  readonly style: StyleConfig;
  readonly target: RenderTarget;
  readonly suppressDisplay: boolean;
  /** Emit the generated program instead of rendering it */
  readonly dryRun?: boolean;
}

export interface PlotDeps {
  renderer: Renderer;
  viewer: Viewer;
  pngBackendAvailable: boolean;
  fs?: OutputFileSystem;
  report?: (line: string) => void;
  /** Sink for the dry-run program (default: stdout) */
  writeProgram?: (program: string) => void;
}

export interface PlotResult {
  runs: RunCollection;
  target: RenderTarget;
  rendered: boolean;
}

export async function runPlotPipeline(
  lines: Iterable<string>,
  options: PlotOptions,
  deps: PlotDeps,
): Promise<PlotResult> {
  const runs = parseProgress(lines, createLossTransform(options.transform));
  const spec = buildChartSpec(runs, options.style, options.transform);
  log.debug('Built chart spec', { series: spec.series.length, legend: spec.legend.entries });

  if (options.dryRun) {
    const program = buildRenderProgram(spec, options.target, { pngBackendAvailable: deps.pngBackendAvailable });
    (deps.writeProgram ?? ((text: string) => process.stdout.write(text)))(program);
    return { runs, target: options.target, rendered: false };
  }

  await dispatchChart(spec, options.target, {
    renderer: deps.renderer,
    pngBackendAvailable: deps.pngBackendAvailable,
    fs: deps.fs,
  });
  await presentChart(options.target, options.suppressDisplay, {
    viewer: deps.viewer,
    fs: deps.fs,
    report: deps.report,
  });

  return { runs, target: options.target, rendered: true };
}
