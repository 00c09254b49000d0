/**
 * Runs shell commands for `shellOut`. The child inherits the terminal, so
 * the caller must have released it first.
 */

import { spawn } from 'node:child_process';

export interface ProcessRunner {
  /**
   * Run a command through the shell and wait for it.
   *
   * @returns The exit code, or null when the child was killed by a signal
   */
  run(command: string): Promise<number | null>;
}

export interface ShellProcessRunnerOptions {
  /** Shell binary (default: the platform shell) */
  shell?: string;
}

export function createShellProcessRunner(options: ShellProcessRunnerOptions = {}): ProcessRunner {
  return {
    run(command: string): Promise<number | null> {
      return new Promise((resolve, reject) => {
        const child = spawn(command, { stdio: 'inherit', shell: options.shell ?? true });
        child.once('error', reject);
        child.once('exit', (code) => resolve(code));
      });
    },
  };
}
