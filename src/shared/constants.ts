/**
 * Application-wide constants
 */

/** Default output file name, created under the OS temp directory */
export const DEFAULT_OUTPUT_FILENAME = 'lossplot.png';

/** Config file picked up from the working directory when --config is not given */
export const DEFAULT_CONFIG_FILENAME = 'lossplot.yaml';

export const DEFAULT_X_LABEL = 'progress iteration';
export const DEFAULT_Y_LABEL = 'mean loss';
export const DEFAULT_PERCENT_Y_LABEL = 'mean %loss';

export const DEFAULT_WIDTH = 800;
export const DEFAULT_HEIGHT = 600;

/** Statistical engine fed the generated program on stdin */
export const DEFAULT_R_COMMAND = 'R';
export const R_ARGS = ['--vanilla', '--slave'] as const;

/** ImageMagick viewer */
export const DEFAULT_VIEWER_COMMAND = 'display';

/** Process exit codes */
export const ExitCode = {
  Success: 0,
  Failure: 1,
  Usage: 2,
} as const;
export type ExitCode = typeof ExitCode[keyof typeof ExitCode];
