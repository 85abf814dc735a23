import { spawn } from 'node:child_process';

const STDERR_TAIL_BYTES = 2048;

export interface ProcessResult {
  stdout: string;
  stderr: string;
}

export class ProcessError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderrTail: string,
  ) {
    super(`${command} exited with code ${exitCode}${stderrTail ? `: ${stderrTail}` : ''}`);
    this.name = 'ProcessError';
  }
}

/**
 * Keeps the last few KB of a process's stderr for error messages.
 */
export class StderrTail {
  private text = '';

  push(chunk: Buffer | string): void {
    this.text = (this.text + chunk.toString()).slice(-STDERR_TAIL_BYTES);
  }

  toString(): string {
    return this.text.trim();
  }
}

/**
 * Runs a command to completion and collects its output. Aborting `signal`
 * kills the process and rejects with an AbortError.
 */
export function runProcess(command: string, args: string[], signal?: AbortSignal): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { shell: false, stdio: ['ignore', 'pipe', 'pipe'], signal });
    const stdout: Buffer[] = [];
    const stderr = new StderrTail();

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.once('error', reject);
    child.once('close', (code) => {
      if (code === 0) {
        resolve({ stdout: Buffer.concat(stdout).toString('utf8'), stderr: stderr.toString() });
      } else {
        reject(new ProcessError(command, code, stderr.toString()));
      }
    });
  });
}
