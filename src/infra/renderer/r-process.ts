/**
 * Runs an R program by piping it to `R --vanilla --slave`.
 *
 * The program is written to stdin in one piece and stdin is always
 * ended, including when the write throws, so R never waits on a
 * half-written script.
 */

import { spawn } from 'node:child_process';
import { RenderBackendError } from '../../core/models/index.js';
import { R_ARGS } from '../../shared/constants.js';
import { createLogger } from '../../shared/utils/index.js';

const log = createLogger('r-process');

const STDERR_TAIL_MAX_LENGTH = 400;

export interface RProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

function tail(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length <= STDERR_TAIL_MAX_LENGTH) return trimmed;
  return `...${trimmed.slice(-STDERR_TAIL_MAX_LENGTH)}`;
}

export function runRProgram(command: string, program: string): Promise<RProcessResult> {
  return new Promise<RProcessResult>((resolve, reject) => {
    const child = spawn(command, [...R_ARGS], {
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const resolveOnce = (result: RProcessResult): void => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    const rejectOnce = (error: RenderBackendError): void => {
      if (settled) return;
      settled = true;
      reject(error);
    };

    child.stdout.on('data', (chunk: Buffer | string) => {
      stdout += typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
    });
    child.stderr.on('data', (chunk: Buffer | string) => {
      stderr += typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
    });

    // EPIPE when R exits early; the close/error handlers decide the outcome
    child.stdin.on('error', (error: Error) => {
      log.debug('R stdin closed early', { error: error.message });
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      rejectOnce(new RenderBackendError(
        `Failed to start ${command}: ${error.message}`,
        { stderr: tail(stderr) },
        { cause: error },
      ));
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (code === 0) {
        resolveOnce({ exitCode: 0, stdout, stderr });
        return;
      }

      const reason = signal ? `was terminated by ${signal}` : `exited with code ${code ?? 'unknown'}`;
      const detail = tail(stderr);
      rejectOnce(new RenderBackendError(
        detail ? `${command} ${reason}: ${detail}` : `${command} ${reason}`,
        { exitCode: code, stderr: detail },
      ));
    });

    try {
      child.stdin.write(program);
    } finally {
      child.stdin.end();
    }
  });
}
