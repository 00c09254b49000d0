/**
 * In-memory stand-ins for the filesystem, account and process seams.
 */

import type { AccountDirectory } from '../tui/accounts.js';
import type { DirectoryEntry, FileSystem } from '../tui/filesystem.js';
import type { ProcessRunner } from '../tui/process-runner.js';

/**
 * A filesystem described as directory → entries. Entry names ending in "/"
 * are directories.
 *
 * @example
 * ```typescript
 * const fs = new MemoryFileSystem({
 *   '/home/alice': ['notes.txt', 'src/'],
 *   '/home/alice/src': ['main.ts'],
 * });
 * ```
 */
export class MemoryFileSystem implements FileSystem {
  private tree: Map<string, DirectoryEntry[]>;

  constructor(tree: Record<string, string[]>) {
    this.tree = new Map(
      Object.entries(tree).map(([dir, names]) => [
        normalize(dir),
        names.map((name) =>
          name.endsWith('/') ? { name: name.slice(0, -1), isDirectory: true } : { name, isDirectory: false }
        ),
      ])
    );
  }

  listEntries(dir: string): DirectoryEntry[] {
    return (this.tree.get(normalize(dir)) ?? []).map((entry) => ({ ...entry }));
  }

  isDirectory(path: string): boolean {
    return this.tree.has(normalize(path));
  }
}

function normalize(path: string): string {
  return path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;
}

export class FakeAccounts implements AccountDirectory {
  private current: string;
  private homes: Map<string, string>;

  constructor(current: string, homes: Record<string, string>) {
    this.current = current;
    this.homes = new Map(Object.entries(homes));
  }

  currentUser(): string {
    return this.current;
  }

  homeDirectory(name: string): string | null {
    return this.homes.get(name) ?? null;
  }

  listAccounts(): string[] {
    return [...this.homes.keys()];
  }
}

/**
 * Records commands and answers each with a fixed exit code.
 */
export class FakeProcessRunner implements ProcessRunner {
  commands: string[] = [];
  private exitCode: number | null;
  private onRun: (() => void) | null;

  constructor(exitCode: number | null = 0, onRun: (() => void) | null = null) {
    this.exitCode = exitCode;
    this.onRun = onRun;
  }

  run(command: string): Promise<number | null> {
    this.commands.push(command);
    this.onRun?.();
    return Promise.resolve(this.exitCode);
  }
}
