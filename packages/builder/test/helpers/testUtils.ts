/**
 * Test utilities for temporary fixture roots
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

/**
 * Create an empty temp directory. Returns its absolute path.
 */
export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'fakedata-test-'));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export interface TreeListing {
  /** Relative, forward-slash paths, sorted */
  directories: string[];
  files: string[];
}

/**
 * List everything under root (root itself excluded).
 */
export function listTree(root: string): TreeListing {
  const directories: string[] = [];
  const files: string[] = [];

  const walk = (dir: string, rel: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const childRel = rel ? `${rel}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        directories.push(childRel);
        walk(path.join(dir, entry.name), childRel);
      } else {
        files.push(childRel);
      }
    }
  };
  walk(root, '');

  return { directories: directories.sort(), files: files.sort() };
}
