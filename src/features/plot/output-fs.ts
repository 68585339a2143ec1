import { existsSync, rmSync } from 'node:fs';

/** File operations the dispatcher and presenter need on the output path */
export interface OutputFileSystem {
  exists(path: string): boolean;
  remove(path: string): void;
}

export const nodeOutputFileSystem: OutputFileSystem = {
  exists: (path) => existsSync(path),
  remove: (path) => rmSync(path, { force: true }),
};
