/**
 * Render dispatch
 *
 * Guards the output path, generates the drawing program for the
 * target's device and submits it to the renderer in one piece.
 */

import {
  OutputExistsError,
  RenderBackendError,
  type ChartSpec,
  type RenderTarget,
} from '../../core/models/index.js';
import { buildRenderProgram } from '../../core/render/index.js';
import type { Renderer } from '../../infra/renderer/index.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import { nodeOutputFileSystem, type OutputFileSystem } from './output-fs.js';

const log = createLogger('dispatcher');

export interface DispatchDeps {
  renderer: Renderer;
  /** Result of the one-time Cairo check */
  pngBackendAvailable: boolean;
  fs?: OutputFileSystem;
}

/**
 * Default targets are cleared before rendering so repeated runs never
 * see a stale file; a user-named file that already exists is never
 * overwritten.
 */
export function prepareOutput(target: RenderTarget, fs: OutputFileSystem): void {
  if (target.isDefault) {
    fs.remove(target.path);
    return;
  }
  if (fs.exists(target.path)) {
    throw new OutputExistsError(target.path);
  }
}

export async function dispatchChart(spec: ChartSpec, target: RenderTarget, deps: DispatchDeps): Promise<void> {
  const fs = deps.fs ?? nodeOutputFileSystem;
  prepareOutput(target, fs);

  const program = buildRenderProgram(spec, target, { pngBackendAvailable: deps.pngBackendAvailable });
  log.debug('Dispatching chart', {
    path: target.path,
    device: target.device,
    series: spec.series.length,
    cairo: deps.pngBackendAvailable,
  });

  try {
    await deps.renderer.submit(program, target.device);
  } catch (e) {
    if (e instanceof RenderBackendError) throw e;
    throw new RenderBackendError(`Renderer failed: ${getErrorMessage(e)}`, {}, { cause: e });
  }

  if (!fs.exists(target.path)) {
    throw new RenderBackendError(`Renderer produced no output at ${target.path}`);
  }
}
