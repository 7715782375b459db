#!/usr/bin/env npx tsx
/**
 * Scaffold the fakedata tree for the converter tests.
 *
 * Usage: npx tsx src/main.ts [--root <dir>] [--clean] [--verify] [--quiet]
 */

import { runCli } from './cli.js';

process.exitCode = runCli(process.argv.slice(2));
