export { buildChartSpec, legendEntry, legendTitle } from './chart-spec-builder.js';
export { SERIES_PALETTE, SERIES_MARKER, paletteColor } from './palette.js';
