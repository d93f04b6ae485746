import type { LogRecord, Scope } from "../types/domain";
import type { LogQuery, LogRecordSource } from "../types/sources";
import { log } from "./logger";
import { OneShot } from "./one-shot";

export type LogFeedEvent =
  | { type: "loaded"; unitName: string; records: LogRecord[] }
  | { type: "load-failed"; unitName: string; message: string }
  | { type: "appended"; unitName: string; records: LogRecord[] }
  | { type: "tail-failed"; unitName: string; message: string };

export interface LogFeedOptions {
  limit: number;
}

/**
 * Full loads and cursor tails for the selected unit's journal.
 * A load supersedes everything in flight; tails never overlap.
 */
export class LogFeed {
  private load: OneShot<LogFeedEvent> | null = null;
  private tail: OneShot<LogFeedEvent> | null = null;

  constructor(
    private readonly source: LogRecordSource,
    private readonly options: LogFeedOptions,
    private readonly wake: () => void = () => {},
  ) {}

  requestLoad(unitName: string, scope: Scope, query: LogQuery): void {
    log.debug(`Loading logs for ${unitName}`, "logs", query);
    const fetch = this.source
      .fetchRecent(unitName, scope, this.options.limit, query)
      .match(
        (records): LogFeedEvent => ({ type: "loaded", unitName, records }),
        (error): LogFeedEvent => ({
          type: "load-failed",
          unitName,
          message: error.message,
        }),
      );
    this.load = this.open(fetch);
    this.tail = null;
  }

  /** Returns false when a load or tail is still running. */
  requestTail(
    unitName: string,
    cursor: string,
    scope: Scope,
    query: LogQuery,
  ): boolean {
    if (this.busy) return false;
    const fetch = this.source.fetchSince(unitName, cursor, scope, query).match(
      (records): LogFeedEvent => ({ type: "appended", unitName, records }),
      (error): LogFeedEvent => ({
        type: "tail-failed",
        unitName,
        message: error.message,
      }),
    );
    this.tail = this.open(fetch);
    return true;
  }

  /** Settled results, a load before a tail. */
  poll(): LogFeedEvent[] {
    const events: LogFeedEvent[] = [];
    const loaded = this.load?.poll();
    if (loaded?.ready) {
      this.load = null;
      events.push(loaded.value);
    }
    const tailed = this.tail?.poll();
    if (tailed?.ready) {
      this.tail = null;
      events.push(tailed.value);
    }
    for (const event of events) {
      if (event.type === "loaded") {
        log.debug(`Loaded ${event.records.length} records`, "logs", event.unitName);
      } else if (event.type === "appended" && event.records.length > 0) {
        log.debug(`Tailed ${event.records.length} records`, "logs", event.unitName);
      }
    }
    return events;
  }

  get busy(): boolean {
    return (this.load?.pending ?? false) || (this.tail?.pending ?? false);
  }

  private open(fetch: PromiseLike<LogFeedEvent>): OneShot<LogFeedEvent> {
    return new OneShot(fetch, {
      onSettled: this.wake,
      onRejected: (e) => log.error("Log fetch crashed", "logs", String(e)),
    });
  }
}
