/**
 * Account Directory
 *
 * Local account lookup for "~name" expansion in filename prompts. The
 * default implementation reads the passwd database; lookups that fail come
 * back as null or an empty list, never as errors.
 */

import { readFileSync } from 'node:fs';
import { userInfo } from 'node:os';

export interface AccountDirectory {
  /** Login name of the current account ('' when unknown) */
  currentUser(): string;
  /** Home directory of an account, or null when there is no such account */
  homeDirectory(name: string): string | null;
  /** All local account names */
  listAccounts(): string[];
}

interface PasswdEntry {
  name: string;
  home: string;
}

/**
 * Parse passwd(5) content: `name:password:uid:gid:gecos:home:shell`.
 */
export function parsePasswd(content: string): PasswdEntry[] {
  const entries: PasswdEntry[] = [];
  for (const line of content.split('\n')) {
    if (line.trim() === '' || line.startsWith('#')) continue;
    const fields = line.split(':');
    const name = fields[0];
    const home = fields[5];
    if (name && home !== undefined) {
      entries.push({ name, home });
    }
  }
  return entries;
}

/**
 * Accounts from /etc/passwd, with the current account taken from
 * os.userInfo(). The passwd file is read once, on first use.
 */
export class SystemAccountDirectory implements AccountDirectory {
  private passwdPath: string;
  private entries: PasswdEntry[] | null = null;

  constructor(passwdPath: string = '/etc/passwd') {
    this.passwdPath = passwdPath;
  }

  currentUser(): string {
    try {
      return userInfo().username;
    } catch {
      // No passwd entry for the running uid (e.g. some containers)
      return process.env['USER'] ?? '';
    }
  }

  homeDirectory(name: string): string | null {
    if (name === this.currentUser()) {
      try {
        return userInfo().homedir;
      } catch {
        // Fall through to the passwd lookup
      }
    }
    return this.load().find((entry) => entry.name === name)?.home ?? null;
  }

  listAccounts(): string[] {
    return this.load().map((entry) => entry.name);
  }

  private load(): PasswdEntry[] {
    if (this.entries === null) {
      try {
        this.entries = parsePasswd(readFileSync(this.passwdPath, 'utf-8'));
      } catch {
        // No passwd database on this platform
        this.entries = [];
      }
    }
    return this.entries;
  }
}
