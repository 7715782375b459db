/**
 * Command-line configuration
 *
 * The command takes no arguments; flags only adjust where and how the
 * fixture is built. There are no environment variables or config files.
 */

import { z } from 'zod';
import { FixtureError } from './errors.js';

export const CliOptionsSchema = z.object({
  root: z.string().min(1, '--root needs a directory').optional(),
  clean: z.boolean().default(false),
  verify: z.boolean().default(false),
  quiet: z.boolean().default(false),
  help: z.boolean().default(false),
}).strict();

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export const USAGE = `Usage: fakedata [--root <dir>] [--clean] [--verify] [--quiet]

  --root <dir>  Build the fixture under <dir> instead of test/fakedata
  --clean       Remove the fixture root before building
  --verify      Check ID links and attachment placeholders after building
  --quiet       Keep diagnostics off stderr
  --help        Show this message`;

const BOOLEAN_FLAGS: Record<string, 'clean' | 'verify' | 'quiet' | 'help'> = {
  '--clean': 'clean',
  '--verify': 'verify',
  '--quiet': 'quiet',
  '--help': 'help',
  '-h': 'help',
};

/**
 * Parse argv (without the node/script entries) into validated options.
 * @throws FixtureError INVALID_ARGS
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const raw: Record<string, unknown> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const flag = BOOLEAN_FLAGS[arg];

    if (flag) {
      raw[flag] = true;
    } else if (arg === '--root') {
      raw.root = argv[i + 1] ?? '';
      i++;
    } else if (arg.startsWith('--root=')) {
      raw.root = arg.slice('--root='.length);
    } else {
      throw new FixtureError('INVALID_ARGS', `Unknown argument: ${arg}`);
    }
  }

  const parsed = CliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues.map(issue => issue.message).join('; ');
    throw new FixtureError('INVALID_ARGS', reason);
  }
  return parsed.data;
}
