import type { DeviceKind } from '../../core/models/index.js';

export interface RenderResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** External engine that executes a generated drawing program */
export interface Renderer {
  submit(program: string, device: DeviceKind): Promise<RenderResult>;
}

export interface RRendererOptions {
  /** R executable (default: R) */
  command?: string;
}
