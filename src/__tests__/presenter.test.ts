/**
 * Tests for presenting the rendered chart
 */

import { describe, it, expect, vi } from 'vitest';
import { MissingOutputError, type RenderTarget } from '../core/models/index.js';
import { presentChart } from '../features/plot/index.js';
import { MemoryFileSystem, RecordingViewer } from './helpers/fakes.js';

describe('presentChart', () => {
  it('should open png output without rotation', async () => {
    const target: RenderTarget = { path: '/out/chart.png', device: 'png', isDefault: false };
    const viewer = new RecordingViewer();

    await presentChart(target, false, { viewer, fs: new MemoryFileSystem([target.path]) });

    expect(viewer.shown).toEqual([{ path: '/out/chart.png', rotate: false }]);
  });

  it('should rotate postscript output', async () => {
    const target: RenderTarget = { path: '/out/chart.eps', device: 'postscript', isDefault: false };
    const viewer = new RecordingViewer();

    await presentChart(target, false, { viewer, fs: new MemoryFileSystem([target.path]) });

    expect(viewer.shown).toEqual([{ path: '/out/chart.eps', rotate: true }]);
  });

  it('should not rotate jpeg output', async () => {
    const target: RenderTarget = { path: '/out/chart.jpg', device: 'jpeg', isDefault: false };
    const viewer = new RecordingViewer();

    await presentChart(target, false, { viewer, fs: new MemoryFileSystem([target.path]) });

    expect(viewer.shown).toEqual([{ path: '/out/chart.jpg', rotate: false }]);
  });

  it('should report the path instead of displaying when suppressed', async () => {
    const target: RenderTarget = { path: '/out/chart.png', device: 'png', isDefault: false };
    const viewer = new RecordingViewer();
    const report = vi.fn();

    await presentChart(target, true, { viewer, fs: new MemoryFileSystem([target.path]), report });

    expect(report).toHaveBeenCalledWith('/out/chart.png');
    expect(viewer.shown).toEqual([]);
  });

  it('should throw MissingOutputError when the file is absent', async () => {
    const target: RenderTarget = { path: '/out/gone.png', device: 'png', isDefault: false };

    await expect(presentChart(target, true, { viewer: new RecordingViewer(), fs: new MemoryFileSystem() }))
      .rejects.toThrow(MissingOutputError);
  });
});
