/**
 * Shows the rendered chart, or just reports where it is.
 */

import { MissingOutputError, type RenderTarget } from '../../core/models/index.js';
import type { Viewer } from '../../infra/viewer/index.js';
import { plain } from '../../shared/ui/index.js';
import { nodeOutputFileSystem, type OutputFileSystem } from './output-fs.js';

export interface PresentDeps {
  viewer: Viewer;
  fs?: Pick<OutputFileSystem, 'exists'>;
  /** Diagnostic sink for the output path (default: stderr) */
  report?: (line: string) => void;
}

export async function presentChart(target: RenderTarget, suppressDisplay: boolean, deps: PresentDeps): Promise<void> {
  const fs = deps.fs ?? nodeOutputFileSystem;
  if (!fs.exists(target.path)) {
    throw new MissingOutputError(target.path);
  }

  if (suppressDisplay) {
    (deps.report ?? plain)(target.path);
    return;
  }

  // Postscript pages come out portrait
  await deps.viewer.show(target.path, target.device === 'postscript');
}
