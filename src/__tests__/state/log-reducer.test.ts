import { describe, expect, it } from "vitest";
import {
  initialLogViewportState,
  type LogViewportState,
  logReducer,
  needsLoad,
  tailCursor,
  topIndex,
  visibleWindow,
} from "../../state/log-reducer";
import type { LogRecord } from "../../types/domain";
import { makeRecord } from "../test-utils";

const messages = ["boot ok", "error one", "fine", "error two", "fine again"];
const records: LogRecord[] = messages.map((m, i) => makeRecord(m, { cursor: `c${i}` }));

function loaded(batch: LogRecord[] = records): LogViewportState {
  let state = logReducer(initialLogViewportState, {
    type: "SET_LOG_VIEWPORT",
    payload: { rows: 3, cols: 80 },
  });
  state = logReducer(state, { type: "LOGS_REQUESTED", payload: { unitName: "nginx.service" } });
  return logReducer(state, { type: "LOGS_LOADED", payload: { unitName: "nginx.service", records: batch } });
}

describe("logReducer", () => {
  it("starts a load tracking the latest records with live tail on", () => {
    const state = logReducer(
      { ...initialLogViewportState, liveTail: false },
      { type: "LOGS_REQUESTED", payload: { unitName: "nginx.service" } },
    );
    expect(state.unitName).toBe("nginx.service");
    expect(state.loading).toBe(true);
    expect(state.liveTail).toBe(true);
    expect(state.scroll).toEqual({ kind: "track-latest" });
  });

  it("shows the newest screenful after a load", () => {
    const state = loaded();
    expect(state.loading).toBe(false);
    expect(visibleWindow(state)).toEqual({ start: 2, end: 5 });
  });

  it("ignores results for a unit that is no longer selected", () => {
    const state = loaded();
    const next = logReducer(state, {
      type: "LOGS_LOADED",
      payload: { unitName: "sshd.service", records: [] },
    });
    expect(next).toBe(state);
  });

  it("replaces the buffer with one error record when the load fails", () => {
    let state = logReducer(initialLogViewportState, {
      type: "LOGS_REQUESTED",
      payload: { unitName: "nginx.service" },
    });
    state = logReducer(state, {
      type: "LOGS_LOAD_FAILED",
      payload: { unitName: "nginx.service", message: "journalctl timed out" },
    });
    expect(state.records).toEqual([{ message: "Error fetching logs: journalctl timed out", severity: 3 }]);
    expect(state.loading).toBe(false);
  });

  it("appends tailed records and keeps following the newest", () => {
    const state = logReducer(loaded(), {
      type: "LOGS_APPENDED",
      payload: { unitName: "nginx.service", records: [makeRecord("six", { cursor: "c5" }), makeRecord("seven", { cursor: "c6" })] },
    });
    expect(state.records).toHaveLength(7);
    expect(topIndex(state)).toBe(4);
    expect(tailCursor(state)).toBe("c6");
  });

  it("keeps a fixed anchor in place when records arrive", () => {
    let state = logReducer(loaded(), { type: "SCROLL_LOGS", payload: -1 });
    state = logReducer(state, {
      type: "LOGS_APPENDED",
      payload: { unitName: "nginx.service", records: [makeRecord("six")] },
    });
    expect(topIndex(state)).toBe(1);
  });

  it("treats an empty tail as a no-op", () => {
    const state = loaded();
    expect(
      logReducer(state, { type: "LOGS_APPENDED", payload: { unitName: "nginx.service", records: [] } }),
    ).toBe(state);
  });

  it("marks discontinuities inside appended batches", () => {
    let state = loaded([makeRecord("a", { bootId: "A" })]);
    state = logReducer(state, {
      type: "LOGS_APPENDED",
      payload: { unitName: "nginx.service", records: [makeRecord("b", { bootId: "B" })] },
    });
    expect(state.markers).toEqual([null, "reboot"]);
  });

  it("pauses live tail on a manual scroll and clamps at the bottom", () => {
    let state = logReducer(loaded(), { type: "SCROLL_LOGS", payload: -1 });
    expect(state.scroll).toEqual({ kind: "fixed", index: 1 });
    expect(state.liveTail).toBe(false);

    state = logReducer(state, { type: "SCROLL_LOGS", payload: 10 });
    expect(state.scroll).toEqual({ kind: "fixed", index: 2 });
  });

  it("jumps to the top and back to the newest", () => {
    let state = logReducer(loaded(), { type: "SCROLL_LOGS_TOP" });
    expect(topIndex(state)).toBe(0);
    state = logReducer(state, { type: "SCROLL_LOGS_BOTTOM" });
    expect(state.scroll).toEqual({ kind: "track-latest" });
    expect(topIndex(state)).toBe(2);
  });

  it("re-enables tail by jumping to the bottom", () => {
    let state = logReducer(loaded(), { type: "SCROLL_LOGS_TOP" });
    state = logReducer(state, { type: "TOGGLE_LIVE_TAIL" });
    expect(state.liveTail).toBe(true);
    expect(state.scroll).toEqual({ kind: "track-latest" });
    state = logReducer(state, { type: "TOGGLE_LIVE_TAIL" });
    expect(state.liveTail).toBe(false);
  });

  it("selects the first match when a search query is typed", () => {
    const state = logReducer(loaded(), { type: "SET_LOG_SEARCH_QUERY", payload: "ERROR" });
    expect(state.search).toEqual({ query: "ERROR", matches: [1, 3], current: 0 });
    expect(state.scroll).toEqual({ kind: "fixed", index: 1 });
  });

  it("cycles through matches in both directions", () => {
    let state = logReducer(loaded(), { type: "SET_LOG_SEARCH_QUERY", payload: "error" });
    state = logReducer(state, { type: "NEXT_LOG_MATCH" });
    expect(state.search.current).toBe(1);
    // record 3 is already on screen
    expect(state.scroll).toEqual({ kind: "fixed", index: 1 });

    state = logReducer(state, { type: "NEXT_LOG_MATCH" });
    expect(state.search.current).toBe(0);
    state = logReducer(state, { type: "PREV_LOG_MATCH" });
    expect(state.search.current).toBe(1);
  });

  it("scrolls to a match that is off screen, wrapping at the end", () => {
    const batch = Array.from({ length: 10 }, (_, i) =>
      makeRecord(i === 2 || i === 7 ? `match ${i}` : `line ${i}`, { cursor: `c${i}` }),
    );
    let state = logReducer(initialLogViewportState, { type: "SET_LOG_VIEWPORT", payload: { rows: 2, cols: 80 } });
    state = logReducer(state, { type: "LOGS_REQUESTED", payload: { unitName: "nginx.service" } });
    state = logReducer(state, { type: "LOGS_LOADED", payload: { unitName: "nginx.service", records: batch } });
    state = logReducer(state, { type: "SET_LOG_SEARCH_QUERY", payload: "match" });
    expect(state.search.matches).toEqual([2, 7]);

    state = logReducer(state, { type: "NEXT_LOG_MATCH" });
    expect(state.search.current).toBe(1);
    expect(state.scroll).toEqual({ kind: "fixed", index: 7 });

    state = logReducer(state, { type: "NEXT_LOG_MATCH" });
    expect(state.search.current).toBe(0);
    expect(state.scroll).toEqual({ kind: "fixed", index: 2 });
    expect(visibleWindow(state)).toEqual({ start: 2, end: 4 });
    expect(state.liveTail).toBe(false);

    state = logReducer(state, { type: "PREV_LOG_MATCH" });
    expect(state.search.current).toBe(1);
    expect(state.scroll).toEqual({ kind: "fixed", index: 7 });
  });

  it("extends the matches with appended records", () => {
    let state = logReducer(loaded(), { type: "SET_LOG_SEARCH_QUERY", payload: "error" });
    state = logReducer(state, {
      type: "LOGS_APPENDED",
      payload: { unitName: "nginx.service", records: [makeRecord("another error")] },
    });
    expect(state.search.matches).toEqual([1, 3, 5]);
  });

  it("drops the buffer and asks for a reload when the severity changes", () => {
    const state = logReducer(loaded(), { type: "SET_SEVERITY", payload: 3 });
    expect(state.records).toEqual([]);
    expect(state.severity).toBe(3);
    expect(needsLoad(state, "nginx.service")).toBe(true);
  });

  it("needs a load only for a different unit or a dirty buffer", () => {
    const state = loaded();
    expect(needsLoad(state, "nginx.service")).toBe(false);
    expect(needsLoad(state, "sshd.service")).toBe(true);
    expect(needsLoad(state, null)).toBe(false);
  });

  it("has no tail cursor without records", () => {
    expect(tailCursor(initialLogViewportState)).toBeNull();
  });
});
