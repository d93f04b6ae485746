import { describe, expect, it, vi } from "vitest";
import { type AppAction, type AppState, appStateReducer } from "../../contexts/AppStateContext";
import { createSessionDriver } from "../../services/session-driver";
import { createStatusService } from "../../services/status-service";
import type { ActionOutcome } from "../../types/sources";
import { emptyProperties } from "../../utils/details";
import {
  createMockState,
  deferred,
  FakeLogSource,
  FakeUnitSource,
  flushPromises,
  makeRecord,
  makeUnit,
} from "../test-utils";

function harness(initial: AppState) {
  const units = new FakeUnitSource();
  const logs = new FakeLogSource();
  const driver = createSessionDriver(units, logs, { logLimit: 50, tailIntervalMs: 1000, blinkIntervalMs: 500 });
  const status = vi.fn();
  driver.setStatusService(createStatusService(status));

  let state = initial;
  const actions: AppAction[] = [];
  const dispatch = (action: AppAction) => {
    actions.push(action);
    state = appStateReducer(state, action);
  };

  return {
    units,
    logs,
    driver,
    status,
    actions,
    dispatch,
    get state() {
      return state;
    },
    step: (now: number) => driver.step(() => state, now, dispatch),
    types: () => actions.map((a) => a.type),
  };
}

describe("SessionDriver", () => {
  it("loads the inventory, then the selected unit's logs, then tails them", async () => {
    const h = harness(createMockState({ filters: { ...createMockState().filters, stale: true } }));
    h.units.units = [makeUnit("nginx.service"), makeUnit("sshd.service")];
    h.logs.recent = [makeRecord("started", { cursor: "c1" })];
    h.logs.since = [makeRecord("request served", { cursor: "c2" })];

    expect(h.step(0)).toBe(1000);
    expect(h.units.listCalls).toEqual([{ category: "service", scope: "system" }]);
    expect(h.status).toHaveBeenLastCalledWith("Loading services…");

    await flushPromises();
    expect(h.step(10)).toBe(1000);
    expect(h.status).toHaveBeenLastCalledWith("2 services");
    expect(h.logs.recentCalls).toEqual([
      { name: "nginx.service", limit: 50, query: { severity: null, timeRange: "all" } },
    ]);

    await flushPromises();
    expect(h.step(20)).toBe(990);
    expect(h.state.logs.records.map((r) => r.message)).toEqual(["started"]);

    expect(h.step(1010)).toBe(1000);
    expect(h.logs.sinceCalls).toEqual([
      { name: "nginx.service", cursor: "c1", query: { severity: null, timeRange: "all" } },
    ]);

    await flushPromises();
    h.step(1020);
    expect(h.state.logs.records.map((r) => r.message)).toEqual(["started", "request served"]);
  });

  it("does not request the same inventory twice", () => {
    const h = harness(createMockState({ filters: { ...createMockState().filters, stale: true } }));
    h.step(0);
    h.step(1);
    expect(h.units.listCalls).toHaveLength(1);
  });

  it("does not tail while live tail is paused", async () => {
    const h = harness(createMockState({}, [makeUnit("nginx.service")]));
    h.logs.recent = [makeRecord("started", { cursor: "c1" })];
    h.step(0);
    await flushPromises();
    h.step(10);
    h.dispatch({ type: "TOGGLE_LIVE_TAIL" });
    h.step(5000);
    expect(h.logs.sinceCalls).toEqual([]);
  });

  it("keeps the buffer and warns when a tail fails", async () => {
    const h = harness(createMockState({}, [makeUnit("nginx.service")]));
    h.logs.recent = [makeRecord("started", { cursor: "c1" })];
    h.step(0);
    await flushPromises();
    h.step(10);

    h.logs.error = { kind: "timeout", message: "journalctl timed out" };
    h.step(1000);
    await flushPromises();
    h.step(1010);

    expect(h.state.logs.records.map((r) => r.message)).toEqual(["started"]);
    expect(h.status).toHaveBeenLastCalledWith("Log tail failed: journalctl timed out");
  });

  it("clears the log panel when no unit is selected", () => {
    const base = createMockState();
    const h = harness({ ...base, logs: { ...base.logs, unitName: "gone.service" } });
    h.step(0);
    expect(h.types()).toContain("LOGS_CLEARED");
    expect(h.state.logs.unitName).toBeNull();
  });

  it("blinks while an action is executing and stays there until dismissed", () => {
    const h = harness(createMockState({ mode: "normal" }, [makeUnit("nginx.service")]));
    h.units.actionReplies.push(new Promise<ActionOutcome>(() => {}));
    h.dispatch({ type: "BEGIN_ACTION", payload: "stop" });

    h.driver.executePending(h.state, h.dispatch);
    expect(h.state.pendingAction.phase).toBe("executing");
    expect(h.status).toHaveBeenLastCalledWith("Stopping...");

    expect(h.step(0)).toBe(100);
    h.step(500);
    expect(h.state.ui.indicatorOn).toBe(false);
    h.step(1000);
    expect(h.state.ui.indicatorOn).toBe(true);
    expect(h.state.pendingAction.phase).toBe("executing");

    h.driver.dismissPending(h.dispatch);
    expect(h.state.pendingAction).toEqual({ phase: "idle" });
    expect(h.state.mode).toBe("normal");
  });

  it("settles the action and applies the refreshed inventory", async () => {
    const h = harness(createMockState({}, [makeUnit("nginx.service")]));
    const reply = deferred<ActionOutcome>();
    h.units.actionReplies.push(reply.promise);
    h.units.units = [makeUnit("nginx.service", "dead")];
    h.dispatch({ type: "BEGIN_ACTION", payload: "stop" });
    h.driver.executePending(h.state, h.dispatch);

    reply.resolve({ ok: true, message: "Stop succeeded for nginx.service" });
    await flushPromises();
    h.step(0);
    expect(h.state.pendingAction.phase).toBe("settled");
    expect(h.status).toHaveBeenCalledWith("Stop succeeded for nginx.service");

    await flushPromises();
    h.step(10);
    expect(h.state.filters.units[0].subState).toBe("dead");
  });

  it("only executes a confirmed action", () => {
    const h = harness(createMockState({}, [makeUnit("nginx.service")]));
    h.driver.executePending(h.state, h.dispatch);
    expect(h.units.actionCalls).toEqual([]);
    expect(h.actions).toEqual([]);
  });

  it("fetches properties for the details overlay once", async () => {
    const h = harness(createMockState({}, [makeUnit("nginx.service")]));
    h.units.properties.set("nginx.service", { ...emptyProperties(), mainPid: 812 });
    h.dispatch({ type: "OPEN_DETAILS" });

    h.step(0);
    h.step(1);
    expect(h.types().filter((t) => t === "PROPERTIES_REQUESTED")).toHaveLength(1);

    await flushPromises();
    h.step(2);
    expect(h.state.properties.cache.get("nginx.service")?.mainPid).toBe(812);
  });

  it("drops a property sheet fetched before a scope switch", async () => {
    const h = harness(createMockState({}, [makeUnit("nginx.service")]));
    h.units.properties.set("nginx.service", { ...emptyProperties(), mainPid: 812 });
    h.dispatch({ type: "OPEN_DETAILS" });
    h.step(0);

    h.dispatch({ type: "CLOSE_OVERLAY" });
    h.dispatch({ type: "SET_SCOPE", payload: "user" });
    await flushPromises();
    h.step(1);

    expect(h.state.filters.scope).toBe("user");
    expect(h.state.properties.cache.has("nginx.service")).toBe(false);
  });

  it("fetches the unit file for the viewer", async () => {
    const h = harness(createMockState({}, [makeUnit("nginx.service")]));
    h.units.files.set("nginx.service", ["# /etc/systemd/system/nginx.service", "[Unit]"]);
    h.dispatch({ type: "OPEN_UNIT_FILE" });

    h.step(0);
    await flushPromises();
    h.step(1);
    expect(h.state.modals.unitFile?.lines).toEqual(["# /etc/systemd/system/nginx.service", "[Unit]"]);
  });

  it("shows an error when the unit file cannot be read", async () => {
    const h = harness(createMockState({}, [makeUnit("ghost.service")]));
    h.dispatch({ type: "OPEN_UNIT_FILE" });

    h.step(0);
    await flushPromises();
    h.step(1);
    expect(h.state.modals.unitFile?.error).toBe("No files found for ghost.service.");
  });
});
