/**
 * CLI entry logic: parse options, load config, run the pipeline and
 * map failures to an exit code.
 */

import { tmpdir } from 'node:os';
import { CommanderError } from 'commander';
import { ConfigError, LossplotError } from '../../core/models/index.js';
import { splitLines } from '../../core/progress/index.js';
import { resolveRenderTarget } from '../../core/render/index.js';
import { runPlotPipeline } from '../../features/plot/index.js';
import { loadPlotConfig } from '../../infra/config/index.js';
import { readInputText } from '../../infra/input/index.js';
import { checkPngBackend, RRenderer } from '../../infra/renderer/index.js';
import { ImageViewer } from '../../infra/viewer/index.js';
import { ExitCode } from '../../shared/constants.js';
import { error, LogManager } from '../../shared/ui/index.js';
import { createLogger, getErrorMessage } from '../../shared/utils/index.js';
import { resolvePlotSettings } from './options.js';
import { createProgram, type CliOptions } from './program.js';

const log = createLogger('cli');

export interface MainContext {
  cwd?: string;
  tmpDir?: string;
  stdin?: NodeJS.ReadableStream;
}

function exitCodeFor(err: unknown): ExitCode {
  return err instanceof ConfigError ? ExitCode.Usage : ExitCode.Failure;
}

export async function main(argv: readonly string[] = process.argv, context: MainContext = {}): Promise<ExitCode> {
  const program = createProgram();
  try {
    program.parse([...argv]);
  } catch (e) {
    if (e instanceof CommanderError) {
      return e.exitCode === 0 ? ExitCode.Success : ExitCode.Usage;
    }
    throw e;
  }

  const cli = program.opts<CliOptions>();
  if (cli.verbose) {
    LogManager.getInstance().setLogLevel('debug');
  }

  try {
    const fileConfig = loadPlotConfig(cli.config, context.cwd ?? process.cwd());
    const settings = resolvePlotSettings(cli, fileConfig, { tmpDir: context.tmpDir ?? tmpdir() });
    if (settings.verbose) {
      LogManager.getInstance().setLogLevel('debug');
    }

    const target = resolveRenderTarget(settings.output, settings.defaultOutput);
    const pngBackendAvailable = target.device === 'png' && !settings.dryRun
      ? await checkPngBackend({ command: settings.rCommand })
      : false;

    const text = await readInputText(program.args, context.stdin);
    const result = await runPlotPipeline(splitLines(text), {
      transform: settings.transform,
      style: settings.style,
      target,
      suppressDisplay: settings.suppressDisplay,
      dryRun: settings.dryRun,
    }, {
      renderer: new RRenderer({ command: settings.rCommand }),
      viewer: new ImageViewer(settings.viewer),
      pngBackendAvailable,
    });

    log.debug('Done', { runs: result.runs.length, path: result.target.path, rendered: result.rendered });
    return ExitCode.Success;
  } catch (e) {
    error(getErrorMessage(e));
    log.debug('Invocation failed', {
      code: e instanceof LossplotError ? e.code : undefined,
      stack: e instanceof Error ? e.stack : undefined,
    });
    return exitCodeFor(e);
  }
}
