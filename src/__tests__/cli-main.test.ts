/**
 * Tests for the CLI entry logic (exit codes and dry-run output)
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Readable } from 'node:stream';

const { mockSpawn } = vi.hoisted(() => ({
  mockSpawn: vi.fn(),
}));

vi.mock('node:child_process', () => ({
  spawn: mockSpawn,
}));

import { main } from '../app/cli/main.js';
import { LogManager } from '../shared/ui/index.js';

describe('main', () => {
  let workDir: string;
  let stdout: string;
  let stderr: string;

  beforeEach(() => {
    vi.clearAllMocks();
    LogManager.resetInstance();
    workDir = mkdtempSync(join(tmpdir(), 'lossplot-cli-'));
    stdout = '';
    stderr = '';
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout += String(chunk);
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderr += String(chunk);
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(workDir, { recursive: true, force: true });
  });

  function run(args: string[], stdin: Readable = Readable.from([])): ReturnType<typeof main> {
    return main(['node', 'lossplot', ...args], { cwd: workDir, tmpDir: workDir, stdin });
  }

  it('should print the generated program in dry-run mode', async () => {
    const logFile = join(workDir, 'train.log');
    writeFileSync(logFile, '0.5\n0.3\naverage loss = 0.2\n');

    const code = await run(['--dry-run', '-t', 'nightly', logFile]);

    expect(code).toBe(0);
    expect(stdout.split('\n')[0]).toBe(`png(filename="${join(workDir, 'lossplot.png')}", width=800, height=600)`);
    expect(stdout).toContain('main="nightly")');
    expect(mockSpawn).not.toHaveBeenCalled();
  });

  it('should read stdin when no file is given', async () => {
    const code = await run(['--dry-run', '-Q'], Readable.from(['0\naverage loss = 0\n']));

    expect(code).toBe(0);
    expect(stdout).toContain('ylab="mean %loss"');
    expect(stdout).toContain('title="%loss", legend=c("0.0000")');
  });

  it('should apply settings from the config file', async () => {
    writeFileSync(join(workDir, 'lossplot.yaml'), 'x_label: epoch\nwidth: 640\n');

    const code = await run(['--dry-run'], Readable.from(['0.4\n']));

    expect(code).toBe(0);
    expect(stdout).toContain('width=640, height=600)');
    expect(stdout).toContain('xlab="epoch"');
  });

  it('should exit 1 when the input has no progress data', async () => {
    const code = await run(['--dry-run'], Readable.from(['nothing to see\n']));

    expect(code).toBe(1);
    expect(stderr).toContain('No progress data found in input');
  });

  it('should exit 1 when a user output file already exists', async () => {
    const output = join(workDir, 'report.jpg');
    writeFileSync(output, 'existing');

    const code = await run(['-o', output], Readable.from(['0.4\n']));

    expect(code).toBe(1);
    expect(stderr).toContain(`Output file already exists: ${output}`);
    expect(mockSpawn).not.toHaveBeenCalled();
  });

  it('should exit 2 for -q with -Q', async () => {
    const code = await run(['-q', '-Q']);

    expect(code).toBe(2);
  });

  it('should exit 2 when an explicit config file is missing', async () => {
    const code = await run(['--config', 'missing.yaml']);

    expect(code).toBe(2);
    expect(stderr).toContain('Config file not found');
  });

  it('should exit 0 for --help', async () => {
    const code = await run(['--help']);

    expect(code).toBe(0);
  });
});
