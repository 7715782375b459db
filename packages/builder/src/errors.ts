import type { VerificationIssue } from './verify.js';

export type FixtureErrorCode = 'BUILD_FAILED' | 'VERIFICATION_FAILED' | 'INVALID_ARGS';

export class FixtureError extends Error {
  readonly code: FixtureErrorCode;

  constructor(code: FixtureErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FixtureError';
    this.code = code;
  }
}

/** Step of the build that touched the filesystem when it failed */
export type BuildStep = 'mkdir' | 'write' | 'touch' | 'clean';

/**
 * A filesystem call failed; the fixture tree is in an undefined state.
 */
export class FixtureBuildError extends FixtureError {
  readonly step: BuildStep;
  readonly path: string;
  /** errno code of the underlying failure (EACCES, ENOTDIR, ...) if any */
  readonly errno: string | undefined;

  constructor(step: BuildStep, targetPath: string, cause: unknown) {
    const errno = errnoCode(cause);
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('BUILD_FAILED', `Fixture ${step} failed for ${targetPath}: ${reason}`, { cause });
    this.name = 'FixtureBuildError';
    this.step = step;
    this.path = targetPath;
    this.errno = errno;
  }
}

export class FixtureVerificationError extends FixtureError {
  readonly issues: VerificationIssue[];

  constructor(issues: VerificationIssue[]) {
    const lines = issues.map(issue => `  ${issue.kind}: ${issue.message}`);
    super('VERIFICATION_FAILED', `Fixture verification failed:\n${lines.join('\n')}`);
    this.name = 'FixtureVerificationError';
    this.issues = issues;
  }
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
