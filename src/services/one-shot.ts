export type Polled<T> = { ready: true; value: T } | { ready: false };

type Slot<T> =
  | { kind: "pending" }
  | { kind: "ready"; value: T }
  | { kind: "taken" }
  | { kind: "rejected" };

export interface OneShotOptions {
  /** Called once when the source settles either way. */
  onSettled?: () => void;
  onRejected?: (error: unknown) => void;
}

/**
 * A single value delivered from background work, consumed at most once.
 * `poll` never waits; a source that never settles just stays pending.
 */
export class OneShot<T> {
  private slot: Slot<T> = { kind: "pending" };

  constructor(source: PromiseLike<T>, options: OneShotOptions = {}) {
    source.then(
      (value) => {
        this.slot = { kind: "ready", value };
        options.onSettled?.();
      },
      (error: unknown) => {
        this.slot = { kind: "rejected" };
        options.onRejected?.(error);
        options.onSettled?.();
      },
    );
  }

  poll(): Polled<T> {
    if (this.slot.kind !== "ready") return { ready: false };
    const { value } = this.slot;
    this.slot = { kind: "taken" };
    return { ready: true, value };
  }

  get pending(): boolean {
    return this.slot.kind === "pending";
  }
}
