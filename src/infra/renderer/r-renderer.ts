/**
 * Renderer backed by an R subprocess.
 */

import type { DeviceKind } from '../../core/models/index.js';
import { DEFAULT_R_COMMAND } from '../../shared/constants.js';
import { createLogger } from '../../shared/utils/index.js';
import { runRProgram } from './r-process.js';
import type { Renderer, RenderResult, RRendererOptions } from './types.js';

const log = createLogger('r-renderer');

export class RRenderer implements Renderer {
  private readonly command: string;

  constructor(options: RRendererOptions = {}) {
    this.command = options.command ?? DEFAULT_R_COMMAND;
  }

  async submit(program: string, device: DeviceKind): Promise<RenderResult> {
    log.debug('Submitting program', { command: this.command, device, bytes: Buffer.byteLength(program) });
    const result = await runRProgram(this.command, program);
    if (result.stderr.trim()) {
      log.debug('R wrote to stderr', { stderr: result.stderr.trim() });
    }
    return result;
  }
}
