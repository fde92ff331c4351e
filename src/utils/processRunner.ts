import { spawn } from 'child_process';
import { logger } from './logger';

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  cwd?: string;
  /** Kill the process after this many ms; 0 or undefined waits forever */
  timeoutMs?: number;
  onStdoutLine?: (line: string) => void;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string) {
    const detail = lastMeaningfulLine(stderr);
    super(detail || `${command} exited with code ${exitCode}`);
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * Last non-empty line of a tool's output, which is where the CLIs we drive
 * print the actual error
 */
export function lastMeaningfulLine(output: string): string {
  const lines = output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines.length > 0 ? lines[lines.length - 1] : '';
}

/**
 * Run an external command to completion, collecting its output
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve, reject) => {
    let stdout = '';
    let stderr = '';
    let pending = '';
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const proc = spawn(command, [...args], {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const finish = (error?: Error): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      if (error) {
        reject(error);
      } else {
        resolve({ stdout, stderr });
      }
    };

    if (options.timeoutMs) {
      timer = setTimeout(() => {
        proc.kill('SIGKILL');
        finish(new Error(`${command} timed out after ${options.timeoutMs}ms`));
      }, options.timeoutMs);
    }

    proc.stdout?.on('data', (data: Buffer) => {
      const text = data.toString();
      stdout += text;

      if (options.onStdoutLine) {
        pending += text;
        const lines = pending.split(/\r?\n|\r/);
        pending = lines.pop() ?? '';
        lines.filter((line) => line.length > 0).forEach((line) => options.onStdoutLine?.(line));
      }
    });

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'ENOENT') {
        finish(new Error(`${command} is not installed or not on PATH`));
      } else {
        finish(error);
      }
    });

    proc.on('close', (code) => {
      if (code === 0) {
        if (pending.length > 0) options.onStdoutLine?.(pending);
        finish();
      } else {
        logger.debug('Command failed', { command, code });
        finish(new CommandFailedError(command, code, stderr || stdout));
      }
    });
  });
};
