/**
 * Optional YAML configuration file.
 *
 * Holds defaults for the command-line options. Keys are snake_case;
 * the loaded value is camelCase. Command-line options always win.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod/v4';
import { ConfigError, TRANSFORM_MODES, type TransformMode } from '../../core/models/index.js';
import { DEFAULT_CONFIG_FILENAME } from '../../shared/constants.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';

const log = createLogger('config');

const PlotConfigSchema = z.object({
  transform: z.enum(TRANSFORM_MODES).optional(),
  output: z.string().min(1).optional(),
  x_label: z.string().optional(),
  y_label: z.string().optional(),
  title: z.string().optional(),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  suppress_display: z.boolean().optional(),
  viewer: z.string().min(1).optional(),
  r_command: z.string().min(1).optional(),
  verbose: z.boolean().optional(),
}).strict();

export interface PlotFileConfig {
  transform?: TransformMode;
  output?: string;
  xLabel?: string;
  yLabel?: string;
  title?: string;
  width?: number;
  height?: number;
  suppressDisplay?: boolean;
  viewer?: string;
  rCommand?: string;
  verbose?: boolean;
}

export function getDefaultConfigPath(cwd: string): string {
  return join(resolve(cwd), DEFAULT_CONFIG_FILENAME);
}

export function parsePlotConfig(content: string, sourceLabel: string): PlotFileConfig {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (e) {
    throw new ConfigError(`Invalid YAML in ${sourceLabel}: ${getErrorMessage(e)}`, { cause: e });
  }

  // Empty file
  if (raw === null || raw === undefined) {
    return {};
  }

  const result = PlotConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => {
        const path = issue.path.map(String).join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join('; ');
    throw new ConfigError(`Invalid config in ${sourceLabel}: ${details}`);
  }

  const parsed = result.data;
  return {
    transform: parsed.transform,
    output: parsed.output,
    xLabel: parsed.x_label,
    yLabel: parsed.y_label,
    title: parsed.title,
    width: parsed.width,
    height: parsed.height,
    suppressDisplay: parsed.suppress_display,
    viewer: parsed.viewer,
    rCommand: parsed.r_command,
    verbose: parsed.verbose,
  };
}

/**
 * Load the config file.
 * An explicit path must exist; the implicit lossplot.yaml in cwd is optional.
 */
export function loadPlotConfig(explicitPath: string | undefined, cwd: string): PlotFileConfig {
  const path = explicitPath ? resolve(cwd, explicitPath) : getDefaultConfigPath(cwd);

  if (!existsSync(path)) {
    if (explicitPath) {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    return {};
  }

  log.debug('Loading config', { path });
  return parsePlotConfig(readFileSync(path, 'utf-8'), path);
}
