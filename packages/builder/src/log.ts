/**
 * Fixture log
 *
 * Every entry lands in a bounded buffer; stderr gets a copy unless the
 * command runs with --quiet. stdout is left to the command's own output.
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogComponent = 'builder' | 'writer' | 'verify' | 'cli';

export interface LogEntry {
  ts: number;
  component: LogComponent;
  message: string;
  level: LogLevel;
}

export interface LogQuery {
  /** Only entries logged strictly after this timestamp */
  since?: number;
  component?: LogComponent;
  level?: LogLevel;
  /** Most recent N matches */
  limit?: number;
}

const CAPACITY = 200;

const LEVEL_TAG: Record<LogLevel, string> = {
  info: '',
  warn: ' WARN',
  error: ' ERROR',
};

const entries: LogEntry[] = [];
let toStderr = true;

export function fixtureLog(component: LogComponent, message: string, level: LogLevel = 'info'): void {
  entries.push({ ts: Date.now(), component, message, level });
  entries.splice(0, Math.max(0, entries.length - CAPACITY));

  if (toStderr) {
    console.error(`[Fixtures]${LEVEL_TAG[level]} [${component}] ${message}`);
  }
}

/** --quiet turns the stderr copy off; the buffer keeps recording. */
export function setLogMirror(enabled: boolean): void {
  toStderr = enabled;
}

export function getFixtureLog(query: LogQuery = {}): LogEntry[] {
  const { since, component, level, limit = 100 } = query;
  const matches = entries.filter(entry =>
    (since === undefined || entry.ts > since) &&
    (component === undefined || entry.component === component) &&
    (level === undefined || entry.level === level)
  );
  return matches.slice(-limit);
}

export function clearFixtureLog(): void {
  entries.length = 0;
}
