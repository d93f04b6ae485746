import type { Scope, Unit, UnitCategory } from "../types/domain";
import type { UnitRecordSource } from "../types/sources";
import { log } from "./logger";
import { OneShot } from "./one-shot";

export type InventoryEvent =
  | { type: "loaded"; category: UnitCategory; scope: Scope; units: Unit[] }
  | { type: "failed"; category: UnitCategory; scope: Scope; message: string };

/**
 * Background inventory fetches. A new request replaces the one in flight,
 * whose result is then never delivered.
 */
export class InventoryLoader {
  private channel: OneShot<InventoryEvent> | null = null;

  constructor(
    private readonly source: UnitRecordSource,
    private readonly wake: () => void = () => {},
  ) {}

  request(category: UnitCategory, scope: Scope): void {
    log.info(`Fetching ${category} units`, "inventory", { scope });
    const fetch = this.source.listUnits(category, scope).match(
      (units): InventoryEvent => ({ type: "loaded", category, scope, units }),
      (error): InventoryEvent => ({
        type: "failed",
        category,
        scope,
        message: error.message,
      }),
    );
    this.channel = new OneShot(fetch, {
      onSettled: this.wake,
      onRejected: (e) => log.error("Inventory fetch crashed", "inventory", String(e)),
    });
  }

  poll(): InventoryEvent | null {
    const polled = this.channel?.poll();
    if (!polled?.ready) return null;
    this.channel = null;
    const event = polled.value;
    if (event.type === "loaded") {
      log.info(`Loaded ${event.units.length} units`, "inventory");
    } else {
      log.warn(`Inventory fetch failed: ${event.message}`, "inventory");
    }
    return event;
  }

  get loading(): boolean {
    return this.channel?.pending ?? false;
  }
}
