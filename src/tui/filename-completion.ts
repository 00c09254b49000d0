/**
 * Filename Completion
 *
 * The completion policy used by filename prompts:
 * - "~name" (anywhere in the text) expands to that account's home directory;
 *   when no such account exists, matching account names are offered instead.
 *   A bare "~" means the current account.
 * - Anything else completes as a path prefix. Directories carry a trailing
 *   "/" so the next tab descends into them.
 *
 * @example
 * ```typescript
 * const complete = createFilenameCompleter({ fileSystem, accounts });
 * complete('src/ma');
 * // => [['src/main.ts', 'main.ts'], ['src/maps/', 'maps/']]
 *
 * complete('~ali');
 * // => [['~alice', '~alice'], ['~alison', '~alison']]   (no account "ali")
 * ```
 */

import type { AccountDirectory } from './accounts.js';
import type { FileSystem } from './filesystem.js';
import type { Completion, CompletionProvider } from './types.js';

/** "~" followed by an optional account name, up to whitespace or "/". */
const TILDE_PATTERN = /(~([^\s/]*))/;

export interface FilenameCompleterOptions {
  fileSystem: FileSystem;
  accounts: AccountDirectory;
}

export function createFilenameCompleter(options: FilenameCompleterOptions): CompletionProvider {
  return (text) => completeFilename(text, options);
}

export function completeFilename(text: string, { fileSystem, accounts }: FilenameCompleterOptions): Completion[] {
  const match = TILDE_PATTERN.exec(text);
  if (match) {
    const full = match[1] ?? '~';
    const given = match[2] ?? '';
    const name = given === '' ? accounts.currentUser() : given;

    const home = accounts.homeDirectory(name);
    if (home !== null) {
      return [[text.replace(full, home), `~${name}`]];
    }

    return accounts
      .listAccounts()
      .filter((account) => account.startsWith(name))
      .map((account): Completion => [text.replace(full, `~${account}`), `~${account}`]);
  }

  return completePathPrefix(text, fileSystem);
}

/**
 * Entries whose path starts with `text`, sorted by path.
 *
 * Hidden entries only show up once the typed name starts with a dot.
 */
export function completePathPrefix(text: string, fileSystem: FileSystem): Completion[] {
  const slash = text.lastIndexOf('/');
  const displayPrefix = text.slice(0, slash + 1);
  const namePrefix = text.slice(slash + 1);
  const dir = displayPrefix === '' ? '.' : displayPrefix;

  return fileSystem
    .listEntries(dir)
    .filter((entry) => entry.name.startsWith(namePrefix))
    .filter((entry) => !entry.name.startsWith('.') || namePrefix.startsWith('.'))
    .map((entry): Completion => {
      const suffix = entry.isDirectory ? '/' : '';
      return [displayPrefix + entry.name + suffix, entry.name + suffix];
    })
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Replace a leading "~" or "~name" with the home directory it names.
 * Paths naming an unknown account are returned unchanged.
 */
export function expandHome(path: string, accounts: AccountDirectory): string {
  const match = /^~([^/]*)/.exec(path);
  if (!match) return path;

  const given = match[1] ?? '';
  const home = accounts.homeDirectory(given === '' ? accounts.currentUser() : given);
  return home === null ? path : home + path.slice(match[0].length);
}

/**
 * Characters of the text that the candidates' labels share with it: the
 * basename being completed, or nothing right after a "/".
 */
export function completionPrefixLength(text: string): number {
  if (text.endsWith('/')) return 0;
  return text.slice(text.lastIndexOf('/') + 1).length;
}
