export { loadPlotConfig, parsePlotConfig, getDefaultConfigPath, type PlotFileConfig } from './plotConfig.js';
