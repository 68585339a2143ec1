export { RRenderer } from './r-renderer.js';
export { checkPngBackend, PNG_CHECK_PROGRAM } from './capability.js';
export { runRProgram, type RProcessResult } from './r-process.js';
export type { Renderer, RenderResult, RRendererOptions } from './types.js';
