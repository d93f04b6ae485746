import type { ResultAsync } from 'neverthrow';
import type {
  LogRecord,
  Scope,
  TimeRange,
  Unit,
  UnitAction,
  UnitCategory,
  UnitProperties,
} from './domain';

export type SourceErrorKind = 'spawn' | 'exit' | 'parse' | 'timeout';

export interface SourceError {
  kind: SourceErrorKind;
  message: string;
}

/** Outcome of a lifecycle action: Ok carries the success message, Err the failure message. */
export type ActionOutcome =
  | { ok: true; message: string }
  | { ok: false; message: string };

export interface LogQuery {
  severity: number | null;
  timeRange: TimeRange;
}

export interface UnitRecordSource {
  listUnits(category: UnitCategory, scope: Scope): ResultAsync<Unit[], SourceError>;
  /** Never fails: degrades to an empty property sheet. */
  getProperties(name: string, scope: Scope): Promise<UnitProperties>;
  runAction(action: UnitAction, name: string, scope: Scope): Promise<ActionOutcome>;
  getFileContent(name: string, scope: Scope): ResultAsync<string[], SourceError>;
}

export interface LogRecordSource {
  fetchRecent(
    name: string,
    scope: Scope,
    limit: number,
    query: LogQuery,
  ): ResultAsync<LogRecord[], SourceError>;
  fetchSince(
    name: string,
    cursor: string,
    scope: Scope,
    query: LogQuery,
  ): ResultAsync<LogRecord[], SourceError>;
}
