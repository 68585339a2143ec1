/**
 * Output device selection.
 *
 * The device depends only on the output file's extension, matched
 * exactly (`.ps`, `.eps`, `.jpg`); anything else renders PNG.
 */

import { extname, resolve } from 'node:path';
import type { DeviceKind, RenderTarget } from '../models/index.js';

const DEVICE_BY_EXTENSION: Readonly<Record<string, DeviceKind>> = {
  '.ps': 'postscript',
  '.eps': 'postscript',
  '.jpg': 'jpeg',
};

export function selectDevice(path: string): DeviceKind {
  return DEVICE_BY_EXTENSION[extname(path)] ?? 'png';
}

export function resolveRenderTarget(outputPath: string | undefined, defaultPath: string): RenderTarget {
  const path = outputPath ?? defaultPath;
  return {
    path,
    device: selectDevice(path),
    isDefault: resolve(path) === resolve(defaultPath),
  };
}
