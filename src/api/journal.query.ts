import { err, ok, type Result, type ResultAsync } from 'neverthrow';
import type { LogRecord, Scope } from '../types/domain';
import type { LogQuery, SourceError } from '../types/sources';
import { timeRangeSince } from '../utils/catalog';
import { type CommandOutput, runCommand, type SystemdBinaries } from './exec';
import { parseJournalOutput } from './parsers';

function severityArgs(query: LogQuery): string[] {
  return query.severity === null ? [] : ['-p', String(query.severity)];
}

function rangeArgs(query: LogQuery): string[] {
  const since = timeRangeSince(query.timeRange);
  return since ? ['--since', since] : [];
}

const unitArgs = (name: string, scope: Scope) => [scope === 'user' ? '--user-unit' : '-u', name];

export function recentArgs(name: string, scope: Scope, limit: number, query: LogQuery): string[] {
  return [
    ...unitArgs(name, scope),
    '-n',
    String(limit),
    '--no-pager',
    '--output=json',
    ...severityArgs(query),
    ...rangeArgs(query),
  ];
}

// journalctl refuses --since next to --after-cursor; the cursor already lies inside the range
export function sinceArgs(name: string, cursor: string, scope: Scope, query: LogQuery): string[] {
  return [
    ...unitArgs(name, scope),
    `--after-cursor=${cursor}`,
    '--no-pager',
    '--output=json',
    ...severityArgs(query),
  ];
}

/**
 * journalctl exits non-zero when a filter matches nothing, so the exit code
 * alone decides nothing: a failure is a non-zero exit that printed only an error.
 */
export function readJournalOutput(file: string, out: CommandOutput): Result<LogRecord[], SourceError> {
  const error = out.stderr.trim();
  if (out.exitCode !== 0 && out.stdout.trim() === '' && error !== '') {
    return err<LogRecord[], SourceError>({ kind: 'exit', message: `${file} failed: ${error}` });
  }
  return ok<LogRecord[], SourceError>(parseJournalOutput(out.stdout));
}

function readJournal(bin: SystemdBinaries, args: string[]): ResultAsync<LogRecord[], SourceError> {
  return runCommand(bin.journalctl, args).andThen((out) => readJournalOutput(bin.journalctl, out));
}

export function fetchRecent(
  bin: SystemdBinaries,
  name: string,
  scope: Scope,
  limit: number,
  query: LogQuery,
): ResultAsync<LogRecord[], SourceError> {
  return readJournal(bin, recentArgs(name, scope, limit, query));
}

export function fetchSince(
  bin: SystemdBinaries,
  name: string,
  cursor: string,
  scope: Scope,
  query: LogQuery,
): ResultAsync<LogRecord[], SourceError> {
  return readJournal(bin, sinceArgs(name, cursor, scope, query));
}
