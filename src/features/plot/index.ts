export { dispatchChart, prepareOutput, type DispatchDeps } from './dispatcher.js';
export { presentChart, type PresentDeps } from './presenter.js';
export { runPlotPipeline, type PlotOptions, type PlotDeps, type PlotResult } from './pipeline.js';
export { nodeOutputFileSystem, type OutputFileSystem } from './output-fs.js';
