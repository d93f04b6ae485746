import { describe, expect, it } from "vitest";
import {
  initialPendingActionState,
  isActionInFlight,
  type PendingActionState,
  pendingActionReducer,
} from "../../state/action-reducer";

const confirming: PendingActionState = { phase: "confirming", action: "restart", unitName: "nginx.service" };

describe("pendingActionReducer", () => {
  it("runs confirming, executing and settled in order", () => {
    let state = pendingActionReducer(initialPendingActionState, {
      type: "ACTION_CONFIRMING",
      payload: { action: "restart", unitName: "nginx.service" },
    });
    expect(state).toEqual(confirming);

    state = pendingActionReducer(state, { type: "ACTION_EXECUTING", payload: { invocation: 1 } });
    expect(state.phase).toBe("executing");
    expect(isActionInFlight(state)).toBe(true);

    state = pendingActionReducer(state, {
      type: "ACTION_SETTLED",
      payload: { invocation: 1, outcome: { ok: true, message: "Restart succeeded for nginx.service" } },
    });
    expect(state).toEqual({
      phase: "settled",
      action: "restart",
      unitName: "nginx.service",
      invocation: 1,
      outcome: { ok: true, message: "Restart succeeded for nginx.service" },
    });
  });

  it("keeps the first pending action while another is confirming", () => {
    const state = pendingActionReducer(confirming, {
      type: "ACTION_CONFIRMING",
      payload: { action: "stop", unitName: "sshd.service" },
    });
    expect(state).toBe(confirming);
  });

  it("does not execute without a confirmation", () => {
    const state = pendingActionReducer(initialPendingActionState, {
      type: "ACTION_EXECUTING",
      payload: { invocation: 1 },
    });
    expect(state).toBe(initialPendingActionState);
  });

  it("ignores a result for another invocation", () => {
    const executing = pendingActionReducer(confirming, { type: "ACTION_EXECUTING", payload: { invocation: 2 } });
    const state = pendingActionReducer(executing, {
      type: "ACTION_SETTLED",
      payload: { invocation: 1, outcome: { ok: false, message: "stale" } },
    });
    expect(state).toBe(executing);
  });

  it("ignores a result that arrives after a dismiss", () => {
    let state = pendingActionReducer(confirming, { type: "ACTION_EXECUTING", payload: { invocation: 3 } });
    state = pendingActionReducer(state, { type: "ACTION_DISMISSED" });
    state = pendingActionReducer(state, {
      type: "ACTION_SETTLED",
      payload: { invocation: 3, outcome: { ok: true, message: "late" } },
    });
    expect(state).toEqual({ phase: "idle" });
  });

  it("returns to idle from any phase on dismiss", () => {
    expect(pendingActionReducer(confirming, { type: "ACTION_DISMISSED" })).toEqual({ phase: "idle" });
  });

  it("uses an empty unit name for host-wide actions", () => {
    const state = pendingActionReducer(initialPendingActionState, {
      type: "ACTION_CONFIRMING",
      payload: { action: "daemon-reload", unitName: "" },
    });
    expect(state).toEqual({ phase: "confirming", action: "daemon-reload", unitName: "" });
  });
});
