/**
 * Filesystem access used by filename completion and the file browser.
 * Unreadable directories list as empty; missing paths are not directories.
 */

import { readdirSync, statSync } from 'node:fs';

export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
}

export interface FileSystem {
  listEntries(dir: string): DirectoryEntry[];
  isDirectory(path: string): boolean;
}

export const nodeFileSystem: FileSystem = {
  listEntries(dir: string): DirectoryEntry[] {
    try {
      return readdirSync(dir, { withFileTypes: true }).map((entry) => ({
        name: entry.name,
        // Follow symlinks so linked directories complete with a separator
        isDirectory: entry.isDirectory() || (entry.isSymbolicLink() && isDirectoryPath(`${dir}/${entry.name}`)),
      }));
    } catch {
      // Directory doesn't exist or can't be read
      return [];
    }
  },

  isDirectory: isDirectoryPath,
};

function isDirectoryPath(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}
