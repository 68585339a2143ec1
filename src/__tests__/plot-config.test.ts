/**
 * Tests for the YAML config file
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { loadPlotConfig, parsePlotConfig } from '../infra/config/index.js';
import { ConfigError } from '../core/models/index.js';

describe('parsePlotConfig', () => {
  it('should map snake_case keys to the loaded config', () => {
    const config = parsePlotConfig([
      'transform: sqrt',
      'x_label: step',
      'y_label: rmse',
      'width: 1024',
      'height: 768',
      'suppress_display: true',
      'r_command: /opt/R/bin/R',
    ].join('\n'), 'test.yaml');

    expect(config).toEqual({
      transform: 'sqrt',
      xLabel: 'step',
      yLabel: 'rmse',
      width: 1024,
      height: 768,
      suppressDisplay: true,
      rCommand: '/opt/R/bin/R',
    });
  });

  it('should treat an empty file as no settings', () => {
    expect(parsePlotConfig('', 'test.yaml')).toEqual({});
  });

  it('should reject an unknown transform', () => {
    expect(() => parsePlotConfig('transform: log', 'test.yaml')).toThrow(ConfigError);
  });

  it('should reject non-positive dimensions', () => {
    expect(() => parsePlotConfig('width: 0', 'test.yaml')).toThrow(/^Invalid config in test\.yaml: width: /);
  });

  it('should reject unknown keys', () => {
    expect(() => parsePlotConfig('colour: red', 'test.yaml')).toThrow(/^Invalid config in test\.yaml: /);
  });

  it('should reject malformed YAML', () => {
    expect(() => parsePlotConfig('width: [1', 'test.yaml')).toThrow(/^Invalid YAML in test\.yaml: /);
  });
});

describe('loadPlotConfig', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'lossplot-config-'));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('should return no settings when the default file is absent', () => {
    expect(loadPlotConfig(undefined, workDir)).toEqual({});
  });

  it('should load lossplot.yaml from the working directory', () => {
    writeFileSync(join(workDir, 'lossplot.yaml'), 'title: nightly runs\n');

    expect(loadPlotConfig(undefined, workDir)).toEqual({ title: 'nightly runs' });
  });

  it('should load an explicit path relative to the working directory', () => {
    writeFileSync(join(workDir, 'custom.yaml'), 'viewer: feh\n');

    expect(loadPlotConfig('custom.yaml', workDir)).toEqual({ viewer: 'feh' });
  });

  it('should fail when an explicit file is missing', () => {
    expect(() => loadPlotConfig('nope.yaml', workDir)).toThrow(`Config file not found: ${join(workDir, 'nope.yaml')}`);
  });
});
