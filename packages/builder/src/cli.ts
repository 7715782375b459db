import { buildFixture, cleanFixture } from './builder.js';
import { FixtureError } from './errors.js';
import { fixtureLog, setLogMirror } from './log.js';
import { parseCliArgs, USAGE, type CliOptions } from './config.js';

export const SUCCESS_MESSAGE = 'Fakedata folder structure created successfully.';

export type ExitCode = 0 | 1 | 2;

function parseOrReport(argv: string[]): CliOptions | null {
  try {
    return parseCliArgs(argv);
  } catch (err) {
    if (err instanceof FixtureError) {
      fixtureLog('cli', err.message, 'error');
      return null;
    }
    throw err;
  }
}

/**
 * Run the fakedata command. Returns the process exit code:
 * 0 on success, 1 when the build or verification fails, 2 on bad usage.
 */
export function runCli(argv: string[], print: (line: string) => void = console.log): ExitCode {
  const options = parseOrReport(argv);
  if (!options) {
    console.error(USAGE);
    return 2;
  }

  if (options.help) {
    print(USAGE);
    return 0;
  }

  setLogMirror(!options.quiet);

  try {
    if (options.clean) {
      cleanFixture(options.root);
    }
    buildFixture({ root: options.root, verify: options.verify });
  } catch (err) {
    if (err instanceof FixtureError) {
      fixtureLog('cli', err.message, 'error');
      return 1;
    }
    throw err;
  }

  print(SUCCESS_MESSAGE);
  return 0;
}
