import type { Scope, UnitCategory, UnitProperties } from "../types/domain";
import type { UnitRecordSource } from "../types/sources";
import { log } from "./logger";
import { OneShot } from "./one-shot";

export type DetailEvent =
  | {
      type: "properties";
      unitName: string;
      scope: Scope;
      category: UnitCategory;
      properties: UnitProperties;
    }
  | { type: "file"; unitName: string; lines: string[] }
  | { type: "file-failed"; unitName: string; message: string };

interface Pending {
  unitName: string;
  scope: Scope;
  channel: OneShot<DetailEvent>;
}

const sameRequest = (pending: Pending | null, unitName: string, scope: Scope) =>
  pending?.unitName === unitName && pending.scope === scope;

/**
 * On-demand property sheets and unit file contents.
 * Repeated requests for the unit already being fetched in the same scope are ignored.
 * Property events carry the category and scope they were fetched for.
 */
export class DetailLoader {
  private properties: Pending | null = null;
  private file: Pending | null = null;

  constructor(
    private readonly source: UnitRecordSource,
    private readonly wake: () => void = () => {},
  ) {}

  requestProperties(unitName: string, scope: Scope, category: UnitCategory): boolean {
    if (sameRequest(this.properties, unitName, scope)) return false;
    const fetch = this.source
      .getProperties(unitName, scope)
      .then((properties): DetailEvent => ({ type: "properties", unitName, scope, category, properties }));
    this.properties = { unitName, scope, channel: this.open(fetch) };
    return true;
  }

  requestFile(unitName: string, scope: Scope): boolean {
    if (sameRequest(this.file, unitName, scope)) return false;
    const fetch = this.source.getFileContent(unitName, scope).match(
      (lines): DetailEvent => ({ type: "file", unitName, lines }),
      (error): DetailEvent => ({ type: "file-failed", unitName, message: error.message }),
    );
    this.file = { unitName, scope, channel: this.open(fetch) };
    return true;
  }

  poll(): DetailEvent[] {
    const events: DetailEvent[] = [];
    const props = this.properties?.channel.poll();
    if (props?.ready) {
      this.properties = null;
      events.push(props.value);
    }
    const file = this.file?.channel.poll();
    if (file?.ready) {
      this.file = null;
      events.push(file.value);
    }
    return events;
  }

  private open(fetch: PromiseLike<DetailEvent>): OneShot<DetailEvent> {
    return new OneShot(fetch, {
      onSettled: this.wake,
      onRejected: (e) => log.error("Detail fetch crashed", "details", String(e)),
    });
  }
}
