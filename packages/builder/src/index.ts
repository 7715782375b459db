export { buildFixture, cleanFixture, type BuildOptions, type BuildResult } from './builder.js';
export { verifyFixture, type VerificationReport, type VerificationIssue, type IssueKind, type IssueSeverity } from './verify.js';
export {
  FAKEDATA,
  NOTE_ONE,
  NOTE_TWO,
  NOTE_ONE_ID,
  HEADING_ONE_ID,
  NOTE_TWO_ID,
  SUBHEADING_ID,
  type FixtureDefinition,
  type FixtureNote,
  type FixturePlaceholder,
} from './fixture.js';
export { DEFAULT_FIXTURE_ROOT, resolveFixtureRoot } from './paths.js';
export { FixtureError, FixtureBuildError, FixtureVerificationError, type FixtureErrorCode, type BuildStep } from './errors.js';
export { fixtureLog, getFixtureLog, clearFixtureLog, setLogMirror, type LogEntry, type LogLevel, type LogComponent } from './log.js';
export { parseCliArgs, CliOptionsSchema, USAGE, type CliOptions } from './config.js';
export { runCli, SUCCESS_MESSAGE, type ExitCode } from './cli.js';
