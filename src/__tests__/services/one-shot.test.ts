import { describe, expect, it, vi } from "vitest";
import { OneShot } from "../../services/one-shot";
import { deferred, flushPromises } from "../test-utils";

describe("OneShot", () => {
  it("stays pending until the source settles", () => {
    const source = deferred<string>();
    const channel = new OneShot(source.promise);
    expect(channel.pending).toBe(true);
    expect(channel.poll()).toEqual({ ready: false });
  });

  it("delivers the value exactly once", async () => {
    const source = deferred<string>();
    const onSettled = vi.fn();
    const channel = new OneShot(source.promise, { onSettled });

    source.resolve("done");
    await flushPromises();

    expect(onSettled).toHaveBeenCalledTimes(1);
    expect(channel.pending).toBe(false);
    expect(channel.poll()).toEqual({ ready: true, value: "done" });
    expect(channel.poll()).toEqual({ ready: false });
  });

  it("reports a rejection and never becomes ready", async () => {
    const source = deferred<string>();
    const onRejected = vi.fn();
    const channel = new OneShot(source.promise, { onRejected });

    source.reject(new Error("boom"));
    await flushPromises();

    expect(onRejected).toHaveBeenCalledWith(new Error("boom"));
    expect(channel.pending).toBe(false);
    expect(channel.poll()).toEqual({ ready: false });
  });
});
