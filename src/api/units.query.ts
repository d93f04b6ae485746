import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { Scope, Unit, UnitCategory, UnitProperties } from '../types/domain';
import type { SourceError } from '../types/sources';
import { emptyProperties } from '../utils/details';
import { runChecked, type SystemdBinaries } from './exec';
import {
  mergeFileStates,
  mergeSocketDetails,
  mergeTimerDetails,
  parseJsonAs,
  parseShowOutput,
  toUnit,
} from './parsers';
import {
  listUnitsSchema,
  socketEntrySchema,
  timerEntrySchema,
  unitFileEntrySchema,
} from './schemas';

export const scopeArgs = (scope: Scope): string[] => (scope === 'user' ? ['--user'] : []);

export function listUnitsArgs(category: UnitCategory, scope: Scope): string[] {
  return [...scopeArgs(scope), 'list-units', `--type=${category}`, '--all', '--no-pager', '--output=json'];
}

// Side queries are best effort: any failure yields null and the merge is skipped.
function sideQuery<T>(
  bin: SystemdBinaries,
  args: string[],
  parse: (stdout: string) => T | null,
): ResultAsync<T | null, never> {
  return runChecked(bin.systemctl, args)
    .map(parse)
    .orElse(() => okAsync<T | null, never>(null));
}

function mergeDetails(
  bin: SystemdBinaries,
  category: UnitCategory,
  scope: Scope,
  units: Unit[],
): ResultAsync<Unit[], never> {
  const scoped = scopeArgs(scope);

  let merged: ResultAsync<Unit[], never> = okAsync(units);
  if (category === 'timer') {
    merged = merged.andThen((current) =>
      sideQuery(bin, [...scoped, 'list-timers', '--all', '--no-pager', '--output=json'], (out) =>
        parseJsonAs(out, timerEntrySchema.array()),
      ).map((timers) => (timers ? mergeTimerDetails(current, timers) : current)),
    );
  } else if (category === 'socket') {
    merged = merged.andThen((current) =>
      sideQuery(bin, [...scoped, 'list-sockets', '--all', '--no-pager', '--output=json'], (out) =>
        parseJsonAs(out, socketEntrySchema.array()),
      ).map((sockets) => (sockets ? mergeSocketDetails(current, sockets) : current)),
    );
  }

  return merged.andThen((current) =>
    sideQuery(
      bin,
      [...scoped, 'list-unit-files', `--type=${category}`, '--no-pager', '--output=json'],
      (out) => parseJsonAs(out, unitFileEntrySchema.array()),
    ).map((files) => (files ? mergeFileStates(current, files) : current)),
  );
}

export function listUnits(
  bin: SystemdBinaries,
  category: UnitCategory,
  scope: Scope,
): ResultAsync<Unit[], SourceError> {
  return runChecked(bin.systemctl, listUnitsArgs(category, scope)).andThen((stdout) => {
    const listed = parseJsonAs(stdout, listUnitsSchema);
    if (!listed) {
      return errAsync<Unit[], SourceError>({ kind: 'parse', message: 'Failed to parse unit list JSON' });
    }
    return mergeDetails(bin, category, scope, listed.map(toUnit));
  });
}

/** Never fails: any error degrades to the zero-value sheet. */
export function getProperties(bin: SystemdBinaries, name: string, scope: Scope): Promise<UnitProperties> {
  return runChecked(bin.systemctl, [...scopeArgs(scope), 'show', name, '--no-pager']).match(
    parseShowOutput,
    () => emptyProperties(),
  );
}

export function getFileContent(
  bin: SystemdBinaries,
  name: string,
  scope: Scope,
): ResultAsync<string[], SourceError> {
  return runChecked(bin.systemctl, [...scopeArgs(scope), 'cat', name, '--no-pager']).map((stdout) =>
    stdout.replace(/\n$/, '').split('\n'),
  );
}
