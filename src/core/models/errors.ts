/**
 * Error types surfaced to the CLI.
 *
 * Every failure is fatal for the current invocation; the CLI maps
 * them to a diagnostic line and a non-zero exit status.
 */

export type LossplotErrorCode =
  | 'NO_PROGRESS_DATA'
  | 'INVALID_LOSS_VALUE'
  | 'OUTPUT_EXISTS'
  | 'RENDER_BACKEND'
  | 'MISSING_OUTPUT'
  | 'VIEWER'
  | 'CONFIG';

export class LossplotError extends Error {
  readonly code: LossplotErrorCode;

  constructor(code: LossplotErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NoProgressDataError extends LossplotError {
  constructor() {
    super('NO_PROGRESS_DATA', 'No progress data found in input');
  }
}

export class InvalidLossValueError extends LossplotError {
  readonly value: number;

  constructor(value: number, reason = 'expected a finite, non-negative number') {
    super('INVALID_LOSS_VALUE', `Invalid loss value: ${value} (${reason})`);
    this.value = value;
  }
}

export class OutputExistsError extends LossplotError {
  readonly path: string;

  constructor(path: string) {
    super('OUTPUT_EXISTS', `Output file already exists: ${path}`);
    this.path = path;
  }
}

export class RenderBackendError extends LossplotError {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    message: string,
    details: { exitCode?: number | null; stderr?: string } = {},
    options?: ErrorOptions,
  ) {
    super('RENDER_BACKEND', message, options);
    this.exitCode = details.exitCode ?? null;
    this.stderr = details.stderr ?? '';
  }
}

export class MissingOutputError extends LossplotError {
  readonly path: string;

  constructor(path: string) {
    super('MISSING_OUTPUT', `Rendered output is missing: ${path}`);
    this.path = path;
  }
}

export class ViewerError extends LossplotError {
  constructor(message: string, options?: ErrorOptions) {
    super('VIEWER', message, options);
  }
}

export class ConfigError extends LossplotError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG', message, options);
  }
}
