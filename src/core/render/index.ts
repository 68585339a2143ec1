export { selectDevice, resolveRenderTarget } from './device.js';
export { buildRenderProgram, buildDeviceStatements, rString, rNumber, type RenderProgramOptions } from './program-builder.js';
