/**
 * Merges command-line options, config file values and defaults into
 * the immutable settings for one invocation.
 */

import { join } from 'node:path';
import { ConfigError, type StyleConfig, type TransformMode } from '../../core/models/index.js';
import { isPercentMode } from '../../core/transform/index.js';
import type { PlotFileConfig } from '../../infra/config/index.js';
import {
  DEFAULT_HEIGHT,
  DEFAULT_OUTPUT_FILENAME,
  DEFAULT_PERCENT_Y_LABEL,
  DEFAULT_R_COMMAND,
  DEFAULT_VIEWER_COMMAND,
  DEFAULT_WIDTH,
  DEFAULT_X_LABEL,
  DEFAULT_Y_LABEL,
} from '../../shared/constants.js';
import type { CliOptions } from './program.js';

export interface PlotSettings {
  readonly transform: TransformMode;
  readonly style: StyleConfig;
  readonly output: string | undefined;
  readonly defaultOutput: string;
  readonly suppressDisplay: boolean;
  readonly viewer: string;
  readonly rCommand: string;
  readonly dryRun: boolean;
  readonly verbose: boolean;
}

export function resolveTransformMode(cli: CliOptions, fileConfig: PlotFileConfig): TransformMode {
  if (cli.sqrt && cli.logPercent) {
    throw new ConfigError('Options -q and -Q are mutually exclusive');
  }
  if (cli.logPercent) return 'log-squared-percent';
  if (cli.sqrt) return 'sqrt';
  return fileConfig.transform ?? 'identity';
}

export function defaultTitle(yLabel: string): string {
  return `${yLabel} convergence`;
}

export function resolveStyle(cli: CliOptions, fileConfig: PlotFileConfig, transform: TransformMode): StyleConfig {
  const yLabel = cli.ylabel
    ?? fileConfig.yLabel
    ?? (isPercentMode(transform) ? DEFAULT_PERCENT_Y_LABEL : DEFAULT_Y_LABEL);

  return Object.freeze({
    xLabel: cli.xlabel ?? fileConfig.xLabel ?? DEFAULT_X_LABEL,
    yLabel,
    title: cli.title ?? fileConfig.title ?? defaultTitle(yLabel),
    width: cli.width ?? fileConfig.width ?? DEFAULT_WIDTH,
    height: cli.height ?? fileConfig.height ?? DEFAULT_HEIGHT,
  });
}

export function resolvePlotSettings(
  cli: CliOptions,
  fileConfig: PlotFileConfig,
  env: { tmpDir: string },
): PlotSettings {
  const transform = resolveTransformMode(cli, fileConfig);
  return Object.freeze({
    transform,
    style: resolveStyle(cli, fileConfig, transform),
    output: cli.output ?? fileConfig.output,
    defaultOutput: join(env.tmpDir, DEFAULT_OUTPUT_FILENAME),
    suppressDisplay: cli.suppressDisplay ?? fileConfig.suppressDisplay ?? false,
    viewer: cli.viewer ?? fileConfig.viewer ?? DEFAULT_VIEWER_COMMAND,
    rCommand: cli.rCommand ?? fileConfig.rCommand ?? DEFAULT_R_COMMAND,
    dryRun: cli.dryRun ?? false,
    verbose: cli.verbose ?? fileConfig.verbose ?? false,
  });
}
