/**
 * Command Execution Wrapper
 *
 * Safe wrapper for executing external commands with:
 * - Timeout handling
 * - Output capture
 * - Spawn error propagation
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds, 0 disables
  maxOutputSize?: number; // bytes
}

/**
 * Signature shared by `executeCommand` and the fakes tests inject in its place
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute an external command, capturing stdout and stderr as UTF-8 text.
 *
 * Resolves with the exit code on every completed run, including non-zero
 * exits. Rejects only when the process cannot be started (ENOENT, EACCES).
 */
export const executeCommand: CommandRunner = async (command, args, options = {}) => {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 0,
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, [...args], spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    let timeoutId: NodeJS.Timeout | null = null;
    let killTimeoutId: NodeJS.Timeout | null = null;
    if (timeout > 0) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        // Force kill after 10 seconds
        killTimeoutId = setTimeout(() => child.kill('SIGKILL'), 10000);
      }, timeout);
    }

    const clearTimers = (): void => {
      if (timeoutId) clearTimeout(timeoutId);
      if (killTimeoutId) clearTimeout(killTimeoutId);
    };

    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');

    child.stdout?.on('data', (chunk: string) => {
      if (stdoutSize < maxOutputSize) {
        stdout += chunk;
        stdoutSize += Buffer.byteLength(chunk);
      }
    });

    child.stderr?.on('data', (chunk: string) => {
      if (stderrSize < maxOutputSize) {
        stderr += chunk;
        stderrSize += Buffer.byteLength(chunk);
      }
    });

    child.on('close', (code, signal) => {
      clearTimers();

      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimers();
      reject(error);
    });
  });
};

/**
 * Render a command and its arguments as a single loggable line.
 * Arguments containing whitespace or quotes are double-quoted.
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map((part) => (/[\s"']/.test(part) ? `"${part.replace(/"/g, '\\"')}"` : part))
    .join(' ');
}
