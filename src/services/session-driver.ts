import type { Dispatch } from "react";
import type { AppAction, AppState } from "../contexts/AppStateContext";
import { selectedUnit } from "../state/filter-reducer";
import { needsLoad, tailCursor } from "../state/log-reducer";
import type { LogQuery, LogRecordSource, UnitRecordSource } from "../types/sources";
import { actionProgressLabel, categoryLabel } from "../utils/catalog";
import { ActionOrchestrator } from "./action-orchestrator";
import { DetailLoader } from "./detail-loader";
import { InventoryLoader } from "./inventory-loader";
import { LogFeed } from "./log-feed";
import { isDue, nextWakeDelay } from "./scheduler";
import { createNoOpStatusService, type StatusService } from "./status-service";

export interface SessionTimings {
  tailIntervalMs: number;
  blinkIntervalMs: number;
}

export interface SessionServices {
  inventory: InventoryLoader;
  logs: LogFeed;
  details: DetailLoader;
  actions: ActionOrchestrator;
}

/**
 * One iteration of the main loop, outside React.
 *
 * `step` delivers whatever background work has settled, starts the work the
 * state asks for, fires due timers, and returns how long the loop may sleep.
 */
export class SessionDriver {
  private tailDueAt: number | null = null;
  private blinkDueAt: number | null = null;
  private wakeHandler: (() => void) | null = null;
  private status: StatusService = createNoOpStatusService();

  constructor(
    readonly services: SessionServices,
    private readonly timings: SessionTimings,
  ) {}

  /** Ask the loop to run a step as soon as possible. */
  wake(): void {
    this.wakeHandler?.();
  }

  onWake(handler: (() => void) | null): void {
    this.wakeHandler = handler;
  }

  setStatusService(status: StatusService): void {
    this.status = status;
  }

  /** `getState` must reflect every action dispatched so far, including this step's. */
  step(getState: () => AppState, now: number, dispatch: Dispatch<AppAction>): number {
    this.deliver(dispatch);
    this.request(getState(), now, dispatch);
    return this.fireTimers(getState(), now, dispatch);
  }

  /** Confirming -> executing; returns without waiting for the command. */
  executePending(state: AppState, dispatch: Dispatch<AppAction>): void {
    const pending = state.pendingAction;
    if (pending.phase !== "confirming") return;
    const invocation = this.services.actions.start({
      action: pending.action,
      unitName: pending.unitName,
      scope: state.filters.scope,
      category: state.filters.category,
    });
    dispatch({ type: "ACTION_STARTED", payload: { invocation } });
    this.status.set(actionProgressLabel(pending.action));
    this.wake();
  }

  dismissPending(dispatch: Dispatch<AppAction>): void {
    this.services.actions.dismiss();
    dispatch({ type: "DISMISS_ACTION" });
  }

  private deliver(dispatch: Dispatch<AppAction>): void {
    const inventory = this.services.inventory.poll();
    if (inventory?.type === "loaded") {
      dispatch({ type: "INVENTORY_LOADED", payload: inventory });
      this.status.set(`${inventory.units.length} ${categoryLabel(inventory.category).toLowerCase()}`);
    } else if (inventory?.type === "failed") {
      dispatch({ type: "INVENTORY_FAILED", payload: inventory });
      this.status.set("Failed to load units");
    }

    for (const event of this.services.logs.poll()) {
      switch (event.type) {
        case "loaded":
          dispatch({ type: "LOGS_LOADED", payload: event });
          break;
        case "load-failed":
          dispatch({ type: "LOGS_LOAD_FAILED", payload: event });
          break;
        case "appended":
          dispatch({ type: "LOGS_APPENDED", payload: event });
          break;
        case "tail-failed":
          this.status.warn(`Log tail failed: ${event.message}`, event.unitName);
          break;
      }
    }

    for (const event of this.services.details.poll()) {
      switch (event.type) {
        case "properties":
          dispatch({ type: "PROPERTIES_LOADED", payload: event });
          break;
        case "file":
          dispatch({ type: "UNIT_FILE_LOADED", payload: event });
          break;
        case "file-failed":
          dispatch({ type: "UNIT_FILE_FAILED", payload: event });
          break;
      }
    }

    const { settled, refreshed } = this.services.actions.poll();
    if (settled) {
      dispatch({ type: "ACTION_SETTLED", payload: settled });
      this.status.set(settled.outcome.message);
    }
    if (refreshed?.type === "loaded") {
      dispatch({ type: "INVENTORY_LOADED", payload: refreshed });
    }
  }

  private request(state: AppState, now: number, dispatch: Dispatch<AppAction>): void {
    const { filters, logs, modals } = state;

    if (filters.stale) {
      this.services.inventory.request(filters.category, filters.scope);
      dispatch({ type: "INVENTORY_REQUESTED" });
      this.status.set(`Loading ${categoryLabel(filters.category).toLowerCase()}…`);
    }

    const unit = selectedUnit(filters);
    if (unit && needsLoad(logs, unit.name)) {
      this.services.logs.requestLoad(unit.name, filters.scope, logQuery(state));
      dispatch({ type: "LOGS_REQUESTED", payload: { unitName: unit.name } });
      this.tailDueAt = now + this.timings.tailIntervalMs;
    } else if (!unit && logs.unitName !== null) {
      dispatch({ type: "LOGS_CLEARED" });
    }

    if (
      state.mode === "details" &&
      modals.detailsUnit !== null &&
      !state.properties.cache.has(modals.detailsUnit) &&
      this.services.details.requestProperties(modals.detailsUnit, filters.scope, filters.category)
    ) {
      dispatch({ type: "PROPERTIES_REQUESTED", payload: modals.detailsUnit });
    }

    const file = modals.unitFile;
    if (state.mode === "unit-file" && file && file.lines === null && file.error === null) {
      this.services.details.requestFile(file.unitName, filters.scope);
    }
  }

  private fireTimers(state: AppState, now: number, dispatch: Dispatch<AppAction>): number {
    const { logs, filters } = state;

    if (logs.liveTail && logs.unitName !== null && !logs.loading) {
      if (this.tailDueAt === null) {
        this.tailDueAt = now + this.timings.tailIntervalMs;
      } else if (isDue(this.tailDueAt, now)) {
        const cursor = tailCursor(logs);
        if (cursor) {
          this.services.logs.requestTail(logs.unitName, cursor, filters.scope, logQuery(state));
        }
        this.tailDueAt = now + this.timings.tailIntervalMs;
      }
    } else if (!logs.loading) {
      this.tailDueAt = null;
    }

    const executing = state.pendingAction.phase === "executing";
    if (executing) {
      if (this.blinkDueAt === null) {
        this.blinkDueAt = now + this.timings.blinkIntervalMs;
      } else if (isDue(this.blinkDueAt, now)) {
        dispatch({ type: "TOGGLE_INDICATOR" });
        this.blinkDueAt = now + this.timings.blinkIntervalMs;
      }
    } else {
      this.blinkDueAt = null;
    }

    return nextWakeDelay({
      now,
      tailDueAt: this.tailDueAt,
      blinkDueAt: this.blinkDueAt,
      actionPending: executing,
    });
  }
}

function logQuery(state: AppState): LogQuery {
  return { severity: state.logs.severity, timeRange: state.logs.timeRange };
}

export interface SessionOptions extends SessionTimings {
  logLimit: number;
}

export function createSessionDriver(
  units: UnitRecordSource,
  logs: LogRecordSource,
  options: SessionOptions,
): SessionDriver {
  let driver: SessionDriver | null = null;
  const wake = () => driver?.wake();
  driver = new SessionDriver(
    {
      inventory: new InventoryLoader(units, wake),
      logs: new LogFeed(logs, { limit: options.logLimit }, wake),
      details: new DetailLoader(units, wake),
      actions: new ActionOrchestrator(units, wake),
    },
    options,
  );
  return driver;
}
