/**
 * treesync VCS — Process execution.
 *
 * Backends shell out through a CommandRunner so tests can substitute a
 * scripted runner for the real binaries.
 */

import { execFile } from 'node:child_process';
import { VcsError } from '../errors/index.js';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandOptions {
  cwd?: string;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Runs the command with execFile. Non-zero exits resolve with their exit
 * code; only failures to start the process (e.g. binary not found) reject.
 */
export const execFileRunner: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      { cwd: options.cwd, encoding: 'utf-8', maxBuffer: MAX_BUFFER, env: { ...process.env, LC_ALL: 'C' } },
      (error, stdout, stderr) => {
        if (error && typeof error.code !== 'number') {
          reject(new VcsError(formatCommand(command, args), error.message, { cause: error }));
          return;
        }
        resolve({ stdout, stderr, exitCode: error ? Number(error.code) : 0 });
      },
    );
  });

/** Run and throw VcsError unless the command exits 0 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: CommandOptions,
): Promise<string> {
  const result = await runner(command, args, options);
  if (result.exitCode !== 0) {
    throw new VcsError(formatCommand(command, args), result.stderr || result.stdout);
  }
  return result.stdout;
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(' ');
}
