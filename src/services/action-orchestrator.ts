import type { Scope, UnitAction, UnitCategory } from "../types/domain";
import type { ActionOutcome, UnitRecordSource } from "../types/sources";
import { actionLabel } from "../utils/catalog";
import type { InventoryEvent } from "./inventory-loader";
import { log } from "./logger";
import { OneShot } from "./one-shot";

export interface ActionRequest {
  action: UnitAction;
  /** "" for host-wide actions. */
  unitName: string;
  scope: Scope;
  /** Inventory to refresh once the action settles. */
  category: UnitCategory;
}

export interface ActionSettlement {
  invocation: number;
  outcome: ActionOutcome;
}

export interface OrchestratorPoll {
  settled: ActionSettlement | null;
  refreshed: InventoryEvent | null;
}

interface InFlight {
  invocation: number;
  request: ActionRequest;
  channel: OneShot<ActionOutcome>;
}

/**
 * Runs one lifecycle action at a time off the input loop.
 *
 * The result arrives on one channel; settling opens a second one that
 * carries the inventory refresh. Neither is ever awaited by the caller.
 */
export class ActionOrchestrator {
  private nextInvocation = 1;
  private inFlight: InFlight | null = null;
  private refresh: OneShot<InventoryEvent> | null = null;

  constructor(
    private readonly source: UnitRecordSource,
    private readonly wake: () => void = () => {},
  ) {}

  /** Starts the action and returns its invocation id immediately. */
  start(request: ActionRequest): number {
    const invocation = this.nextInvocation++;
    const target = request.unitName || "host";
    log.info(`Executing ${request.action} on ${target}`, "action", { invocation });

    const channel = new OneShot(
      this.source.runAction(request.action, request.unitName, request.scope),
      {
        onSettled: this.wake,
        onRejected: (e) =>
          log.error(`${actionLabel(request.action)} crashed`, "action", String(e)),
      },
    );
    this.inFlight = { invocation, request, channel };
    return invocation;
  }

  /** UI-level cancel: the external command keeps running, its result is dropped. */
  dismiss(): void {
    if (this.inFlight) {
      log.info("Pending action dismissed", "action", { invocation: this.inFlight.invocation });
    }
    this.inFlight = null;
  }

  poll(): OrchestratorPoll {
    let settled: ActionSettlement | null = null;

    const polled = this.inFlight?.channel.poll();
    if (this.inFlight && polled?.ready) {
      const { invocation, request } = this.inFlight;
      this.inFlight = null;
      settled = { invocation, outcome: polled.value };
      log.info(polled.value.message, "action", { invocation, ok: polled.value.ok });
      this.startRefresh(request);
    }

    let refreshed: InventoryEvent | null = null;
    const refresh = this.refresh?.poll();
    if (refresh?.ready) {
      this.refresh = null;
      refreshed = refresh.value;
      if (refreshed.type === "failed") {
        log.warn(`Post-action refresh failed: ${refreshed.message}`, "action");
      }
    }

    return { settled, refreshed };
  }

  get executing(): boolean {
    return this.inFlight !== null;
  }

  private startRefresh({ category, scope }: ActionRequest): void {
    const fetch = this.source.listUnits(category, scope).match(
      (units): InventoryEvent => ({ type: "loaded", category, scope, units }),
      (error): InventoryEvent => ({ type: "failed", category, scope, message: error.message }),
    );
    this.refresh = new OneShot(fetch, {
      onSettled: this.wake,
      onRejected: (e) => log.error("Post-action refresh crashed", "action", String(e)),
    });
  }
}
