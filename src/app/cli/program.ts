/**
 * Command-line definition.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Command, InvalidArgumentError, Option } from 'commander';

export type CliOptions = {
  sqrt?: boolean;
  logPercent?: boolean;
  output?: string;
  xlabel?: string;
  ylabel?: string;
  title?: string;
  width?: number;
  height?: number;
  suppressDisplay?: boolean;
  config?: string;
  viewer?: string;
  rCommand?: string;
  dryRun?: boolean;
  verbose?: boolean;
};

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed <= 0) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

function readPackageVersion(): string {
  const packageJsonPath = fileURLToPath(new URL('../../../package.json', import.meta.url));
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('lossplot')
    .description('Plot loss convergence of one or more training runs as overlaid series')
    .version(readPackageVersion(), '-V, --version')
    // -h is the height option
    .helpOption('--help', 'display help for command')
    .argument('[files...]', 'progress log files, concatenated in order (default: stdin)')
    .addOption(new Option('-q, --sqrt', 'plot the square root of the loss').conflicts('logPercent'))
    .addOption(new Option('-Q, --log-percent', 'plot (e^sqrt(loss) - 1) * 100').conflicts('sqrt'))
    .option('-o, --output <path>', 'output file; .ps/.eps = postscript, .jpg = jpeg, otherwise png')
    .option('-x, --xlabel <label>', 'x-axis label')
    .option('-y, --ylabel <label>', 'y-axis label')
    .option('-t, --title <title>', 'chart title')
    .option('-w, --width <px>', 'chart width in pixels', parsePositiveInt)
    .option('-h, --height <px>', 'chart height in pixels', parsePositiveInt)
    .option('-d, --suppress-display', 'print the output path instead of opening a viewer')
    .option('-c, --config <path>', 'YAML config file (default: ./lossplot.yaml if present)')
    .option('--viewer <command>', 'image viewer command')
    .option('--r-command <command>', 'R executable')
    .option('--dry-run', 'print the generated R program and exit')
    .option('--verbose', 'debug logging')
    .exitOverride();

  return program;
}
