/**
 * Fixture Builder
 *
 * Lays the fakedata tree down on disk in one synchronous pass:
 *   1. fixture root + data/
 *   2. attachments/<bucket>/<leaf>/ for every placeholder
 *   3. note files (create-or-replace, atomic per file)
 *   4. empty placeholders (touch)
 *
 * Re-running is safe: directories and placeholders that exist are left as
 * they are and notes are rewritten with identical bytes.
 */

import * as fs from 'fs';
import * as path from 'path';
import { FAKEDATA, type FixtureDefinition } from './fixture.js';
import { FixtureBuildError, FixtureVerificationError } from './errors.js';
import { fixtureLog } from './log.js';
import { resolveFixtureRoot } from './paths.js';
import { ensureDir, touchFile, writeFileAtomic } from './writer.js';
import { verifyFixture, type VerificationReport } from './verify.js';

export interface BuildOptions {
  /** Fixture root; defaults to test/fakedata beside the builder package */
  root?: string;
  /** Read the tree back and fail on dangling links or missing attachments */
  verify?: boolean;
}

export interface BuildResult {
  root: string;
  /** Every directory the build ensured, absolute */
  directories: string[];
  /** Note files written, absolute */
  notes: string[];
  /** Placeholder files ensured, absolute */
  placeholders: string[];
  /** Placeholders that did not exist before this build */
  createdPlaceholders: string[];
  durationMs: number;
  verification?: VerificationReport;
}

function leafDirectory(root: string, definition: FixtureDefinition, bucket: string, leaf: string): string {
  return path.join(root, definition.attachmentsDir, bucket, leaf);
}

/**
 * Build the fakedata fixture tree.
 *
 * @throws FixtureBuildError on the first filesystem failure
 * @throws FixtureVerificationError when `verify` is set and the tree has errors
 */
export function buildFixture(options: BuildOptions = {}): BuildResult {
  const startTime = Date.now();
  const definition = FAKEDATA;
  const root = resolveFixtureRoot(options.root);

  fixtureLog('builder', `Building fixture at ${root}`);

  // Step 1: root and data/
  const dataDir = path.join(root, definition.dataDir);
  const directories = [root, dataDir];
  for (const dir of directories) {
    ensureDir(dir);
  }

  // Step 2: bucket/leaf pairs (mkdir -p creates the bucket)
  for (const { bucket, leaf } of definition.placeholders) {
    const dir = leafDirectory(root, definition, bucket, leaf);
    if (!directories.includes(dir)) {
      ensureDir(dir);
      directories.push(dir);
    }
  }

  // Step 3: notes
  const notes: string[] = [];
  for (const note of definition.notes) {
    const notePath = path.join(root, note.path);
    writeFileAtomic(notePath, note.content);
    notes.push(notePath);
  }
  fixtureLog('builder', `Wrote ${notes.length} notes`);

  // Step 4: placeholders
  const placeholders: string[] = [];
  const createdPlaceholders: string[] = [];
  for (const { bucket, leaf, name } of definition.placeholders) {
    const placeholderPath = path.join(leafDirectory(root, definition, bucket, leaf), name);
    if (touchFile(placeholderPath)) {
      createdPlaceholders.push(placeholderPath);
    }
    placeholders.push(placeholderPath);
  }
  fixtureLog('builder', `Ensured ${placeholders.length} attachment placeholders (${createdPlaceholders.length} new)`);

  const result: BuildResult = {
    root,
    directories,
    notes,
    placeholders,
    createdPlaceholders,
    durationMs: Date.now() - startTime,
  };

  if (options.verify) {
    const report = verifyFixture(root);
    result.verification = report;
    if (!report.ok) {
      throw new FixtureVerificationError(report.errors);
    }
  }

  fixtureLog('builder', `Fixture ready in ${result.durationMs}ms`);
  return result;
}

/**
 * Remove the fixture root and everything under it. A missing root is fine.
 */
export function cleanFixture(root?: string): string {
  const target = resolveFixtureRoot(root);
  try {
    fs.rmSync(target, { recursive: true, force: true });
  } catch (err) {
    throw new FixtureBuildError('clean', target, err);
  }
  fixtureLog('builder', `Removed ${target}`);
  return target;
}
