import type { ResultAsync } from "neverthrow";
import type { SystemdBinaries } from "../api/exec";
import { fetchRecent, fetchSince } from "../api/journal.query";
import { runAction } from "../api/units.command";
import { getFileContent, getProperties, listUnits } from "../api/units.query";
import type {
  LogRecord,
  Scope,
  Unit,
  UnitAction,
  UnitCategory,
  UnitProperties,
} from "../types/domain";
import type {
  ActionOutcome,
  LogQuery,
  LogRecordSource,
  SourceError,
  UnitRecordSource,
} from "../types/sources";

/**
 * Unit and log sources backed by systemctl and journalctl
 */
export class SystemdApiService implements UnitRecordSource, LogRecordSource {
  constructor(private readonly binaries: SystemdBinaries) {}

  listUnits(category: UnitCategory, scope: Scope): ResultAsync<Unit[], SourceError> {
    return listUnits(this.binaries, category, scope);
  }

  getProperties(name: string, scope: Scope): Promise<UnitProperties> {
    return getProperties(this.binaries, name, scope);
  }

  runAction(action: UnitAction, name: string, scope: Scope): Promise<ActionOutcome> {
    return runAction(this.binaries, action, name, scope);
  }

  getFileContent(name: string, scope: Scope): ResultAsync<string[], SourceError> {
    return getFileContent(this.binaries, name, scope);
  }

  fetchRecent(
    name: string,
    scope: Scope,
    limit: number,
    query: LogQuery,
  ): ResultAsync<LogRecord[], SourceError> {
    return fetchRecent(this.binaries, name, scope, limit, query);
  }

  fetchSince(
    name: string,
    cursor: string,
    scope: Scope,
    query: LogQuery,
  ): ResultAsync<LogRecord[], SourceError> {
    return fetchSince(this.binaries, name, cursor, scope, query);
  }
}
