/**
 * Filesystem primitives for the fixture builder
 *
 * All calls are synchronous: each operation completes before the next
 * starts, and the first failure stops the build.
 */

import * as fs from 'fs';
import * as path from 'path';
import { FixtureBuildError, errnoCode } from './errors.js';
import { fixtureLog } from './log.js';

/**
 * mkdir -p. An existing directory is success; an existing file is not.
 */
export function ensureDir(dirPath: string): void {
  try {
    fs.mkdirSync(dirPath, { recursive: true });
  } catch (err) {
    throw new FixtureBuildError('mkdir', dirPath, err);
  }
}

/**
 * Create-or-replace a text file atomically.
 *
 * Content is written to a staging file beside the target and renamed over
 * it, so readers see either the old file or the complete new one.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const stagingPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tmp`
  );

  try {
    fs.writeFileSync(stagingPath, content, 'utf-8');
    fs.renameSync(stagingPath, filePath);
  } catch (err) {
    try {
      fs.rmSync(stagingPath, { force: true });
    } catch (cleanupErr) {
      fixtureLog('writer', `Could not remove staging file ${stagingPath}: ${cleanupErr}`, 'warn');
    }
    throw new FixtureBuildError('write', filePath, err);
  }
}

/**
 * touch: create an empty file if missing. Existing content is left alone.
 * Anything at the path other than a regular file (directory, symlink) fails.
 */
export function touchFile(filePath: string): boolean {
  try {
    const fd = fs.openSync(filePath, 'wx');
    fs.closeSync(fd);
    return true;
  } catch (err) {
    if (!(errnoCode(err) === 'EEXIST' && isRegularFile(filePath))) {
      throw new FixtureBuildError('touch', filePath, err);
    }
  }
  fixtureLog('writer', `Placeholder already present: ${filePath}`);
  return false;
}

function isRegularFile(filePath: string): boolean {
  let stats: fs.Stats;
  try {
    stats = fs.lstatSync(filePath);
  } catch (err) {
    throw new FixtureBuildError('touch', filePath, err);
  }
  return stats.isFile();
}
