/**
 * lossplot library surface
 */

export * from './core/models/index.js';
export { transformLoss, createLossTransform, isPercentMode, type LossTransformFn } from './core/transform/index.js';
export { classifyLine, parseProgress, parseProgressText, splitLines, type ProgressLine } from './core/progress/index.js';
export { buildChartSpec, legendEntry, legendTitle, SERIES_PALETTE, SERIES_MARKER } from './core/chart/index.js';
export { selectDevice, resolveRenderTarget, buildRenderProgram, type RenderProgramOptions } from './core/render/index.js';
export {
  dispatchChart,
  presentChart,
  runPlotPipeline,
  type DispatchDeps,
  type PresentDeps,
  type PlotOptions,
  type PlotDeps,
  type PlotResult,
  type OutputFileSystem,
} from './features/plot/index.js';
export { RRenderer, checkPngBackend, type Renderer, type RenderResult } from './infra/renderer/index.js';
export { ImageViewer, type Viewer } from './infra/viewer/index.js';
