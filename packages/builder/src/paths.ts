import * as path from 'path';
import { fileURLToPath } from 'url';

/** Package root. The builder runs from its sources (tsx, vitest), so this module sits in src/ */
const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

/**
 * Default fixture root, beside the builder's tests.
 * Derived from this module's location so the caller's cwd never matters.
 */
export const DEFAULT_FIXTURE_ROOT = path.join(PACKAGE_ROOT, 'test', 'fakedata');

export function resolveFixtureRoot(root?: string): string {
  return root ? path.resolve(root) : DEFAULT_FIXTURE_ROOT;
}
