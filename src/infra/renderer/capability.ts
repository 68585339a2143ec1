/**
 * Checks whether the enhanced (Cairo) PNG device can be loaded.
 *
 * Run once at startup; the answer is passed to the dispatcher as
 * configuration. Any failure means "not available".
 */

import { DEFAULT_R_COMMAND } from '../../shared/constants.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import { runRProgram } from './r-process.js';
import type { RRendererOptions } from './types.js';

const log = createLogger('png-capability');

export const PNG_CHECK_PROGRAM = 'quit(status = if (requireNamespace("Cairo", quietly = TRUE)) 0 else 1)\n';

export async function checkPngBackend(options: RRendererOptions = {}): Promise<boolean> {
  const command = options.command ?? DEFAULT_R_COMMAND;
  try {
    await runRProgram(command, PNG_CHECK_PROGRAM);
    log.debug('Cairo PNG backend available');
    return true;
  } catch (e) {
    log.debug('Cairo PNG backend unavailable, using png()', { error: getErrorMessage(e) });
    return false;
  }
}
