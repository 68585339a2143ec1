/**
 * Opens a rendered chart in an external image viewer.
 *
 * The viewer is started detached and left running; we only wait
 * until the process has been spawned.
 */

import { spawn } from 'node:child_process';
import { ViewerError } from '../../core/models/index.js';
import { DEFAULT_VIEWER_COMMAND } from '../../shared/constants.js';
import { createLogger } from '../../shared/utils/index.js';

const log = createLogger('image-viewer');

export interface Viewer {
  show(path: string, rotate: boolean): Promise<void>;
}

export function buildViewerArgs(path: string, rotate: boolean): string[] {
  return rotate ? ['-rotate', '90', path] : [path];
}

export class ImageViewer implements Viewer {
  private readonly command: string;

  constructor(command: string = DEFAULT_VIEWER_COMMAND) {
    this.command = command;
  }

  show(path: string, rotate: boolean): Promise<void> {
    const args = buildViewerArgs(path, rotate);
    log.debug('Starting viewer', { command: this.command, args });

    return new Promise<void>((resolve, reject) => {
      const child = spawn(this.command, args, {
        detached: true,
        stdio: 'ignore',
      });

      child.once('spawn', () => {
        child.unref();
        resolve();
      });

      child.once('error', (error: NodeJS.ErrnoException) => {
        reject(new ViewerError(`Failed to start viewer ${this.command}: ${error.message}`, { cause: error }));
      });
    });
  }
}
