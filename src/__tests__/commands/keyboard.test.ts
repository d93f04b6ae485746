import type { Key } from "ink";
import { describe, expect, it } from "vitest";
import { InputRegistry } from "../../commands/registry";
import { defaultInputHandlers } from "../../commands/handlers/keyboard";
import type { CommandContext, InputHandler } from "../../commands/types";
import { type AppState, initialState } from "../../contexts/AppStateContext";
import { createMockContext, createMockState, key } from "../test-utils";

function press(state: AppState, input: string, overrides: Partial<Key> = {}) {
  const registry = new InputRegistry();
  for (const handler of defaultInputHandlers()) registry.registerInputHandler(handler);
  const context = createMockContext(state);
  const handled = registry.handleInput(input, key(overrides), context);
  return { handled, context };
}

const dispatched = (context: ReturnType<typeof createMockContext>) =>
  context.dispatch.mock.calls.map(([action]) => action);

describe("InputRegistry", () => {
  it("asks handlers in priority order and stops at the first taker", () => {
    const seen: string[] = [];
    const handler = (name: string, priority: number, takes: boolean): InputHandler => ({
      priority,
      canHandle: () => true,
      handleInput: () => {
        seen.push(name);
        return takes;
      },
    });
    const registry = new InputRegistry();
    registry.registerInputHandler(handler("low", 0, true));
    registry.registerInputHandler(handler("high", 20, false));
    registry.registerInputHandler(handler("mid", 10, true));

    const context: CommandContext = createMockContext();
    expect(registry.handleInput("x", key(), context)).toBe(true);
    expect(seen).toEqual(["high", "mid"]);
  });
});

describe("normal mode", () => {
  it("moves the unit selection", () => {
    const { context } = press(createMockState(), "j");
    expect(dispatched(context)).toEqual([{ type: "MOVE_SELECTION", payload: 1 }]);
    expect(dispatched(press(createMockState(), "", { pageUp: true }).context)).toEqual([
      { type: "PAGE_SELECTION", payload: -10 },
    ]);
  });

  it("opens pickers and overlays", () => {
    expect(dispatched(press(createMockState(), "s").context)).toEqual([
      { type: "OPEN_PICKER", payload: "status-picker" },
    ]);
    expect(dispatched(press(createMockState(), "T").context)).toEqual([
      { type: "OPEN_PICKER", payload: "time-range-picker" },
    ]);
    expect(dispatched(press(createMockState(), "", { return: true }).context)).toEqual([{ type: "OPEN_DETAILS" }]);
  });

  it("starts a search for the focused pane", () => {
    expect(dispatched(press(createMockState(), "/").context)).toEqual([{ type: "SET_MODE", payload: "search" }]);
    const logs = createMockState({ focus: "logs" });
    expect(dispatched(press(logs, "/").context)).toEqual([{ type: "SET_MODE", payload: "log-search" }]);
  });

  it("toggles the scope", () => {
    const { context } = press(createMockState(), "u");
    expect(dispatched(context)).toEqual([{ type: "SET_SCOPE", payload: "user" }]);
    expect(context.statusLog.info).toHaveBeenCalledWith("Switched to user units");
  });

  it("lets escape fall through when there is no search to clear", () => {
    expect(press(createMockState(), "", { escape: true }).handled).toBe(false);
    const searching = createMockState({ filters: { ...initialState.filters, searchQuery: "ng" } });
    expect(dispatched(press(searching, "", { escape: true }).context)).toEqual([{ type: "CLEAR_SEARCH" }]);
  });

  it("quits on q and ctrl+c", () => {
    expect(press(createMockState(), "q").context.cleanupAndExit).toHaveBeenCalledTimes(1);
    const help = createMockState({ mode: "help" });
    expect(press(help, "c", { ctrl: true }).context.cleanupAndExit).toHaveBeenCalledTimes(1);
  });
});

describe("log pane", () => {
  const logs = createMockState({ focus: "logs" });

  it("scrolls by half a page with ctrl+d", () => {
    expect(dispatched(press(logs, "d", { ctrl: true }).context)).toEqual([{ type: "SCROLL_LOGS", payload: 5 }]);
  });

  it("steps through matches", () => {
    expect(dispatched(press(logs, "N").context)).toEqual([{ type: "PREV_LOG_MATCH" }]);
  });

  it("reports the live tail toggle", () => {
    const { context } = press(logs, "F");
    expect(dispatched(context)).toEqual([{ type: "TOGGLE_LIVE_TAIL" }]);
    expect(context.statusLog.set).toHaveBeenCalledWith(logs.logs.liveTail ? "Live tail off" : "Live tail on");
  });

  it("clears the search before leaving the pane", () => {
    const searching = createMockState({
      focus: "logs",
      logs: { ...initialState.logs, search: { query: "err", matches: [], current: null } },
    });
    expect(dispatched(press(searching, "", { escape: true }).context)).toEqual([{ type: "CLEAR_LOG_SEARCH" }]);
    expect(dispatched(press(logs, "", { escape: true }).context)).toEqual([{ type: "SET_FOCUS", payload: "units" }]);
  });
});

describe("search modes", () => {
  it("appends typed text to the unit query", () => {
    const state = createMockState({ mode: "search", filters: { ...initialState.filters, searchQuery: "ng" } });
    expect(dispatched(press(state, "i").context)).toEqual([{ type: "SET_SEARCH_QUERY", payload: "ngi" }]);
    expect(dispatched(press(state, "", { backspace: true }).context)).toEqual([
      { type: "SET_SEARCH_QUERY", payload: "n" },
    ]);
  });

  it("does not quit while typing q", () => {
    const state = createMockState({ mode: "search" });
    const { context } = press(state, "q");
    expect(dispatched(context)).toEqual([{ type: "SET_SEARCH_QUERY", payload: "q" }]);
    expect(context.cleanupAndExit).not.toHaveBeenCalled();
  });

  it("edits the log query", () => {
    const state = createMockState({ mode: "log-search" });
    expect(dispatched(press(state, "e").context)).toEqual([{ type: "SET_LOG_SEARCH_QUERY", payload: "e" }]);
    expect(dispatched(press(state, "", { return: true }).context)).toEqual([{ type: "SET_MODE", payload: "normal" }]);
  });
});

describe("pickers", () => {
  it("moves, confirms and closes", () => {
    const state = createMockState({ mode: "severity-picker" });
    expect(dispatched(press(state, "k").context)).toEqual([{ type: "PICKER_MOVE", payload: -1 }]);
    expect(dispatched(press(state, "", { return: true }).context)).toEqual([{ type: "CONFIRM_PICKER" }]);
    expect(dispatched(press(state, "p").context)).toEqual([{ type: "CLOSE_OVERLAY" }]);
  });

  it("swallows other keys", () => {
    const { handled, context } = press(createMockState({ mode: "category-picker" }), "q");
    expect(handled).toBe(true);
    expect(context.cleanupAndExit).not.toHaveBeenCalled();
  });

  it("runs an action by its shortcut", () => {
    const state = createMockState({
      mode: "action-picker",
      modals: { ...initialState.modals, actionOptions: ["stop", "restart", "daemon-reload"] },
    });
    expect(dispatched(press(state, "r").context)).toEqual([{ type: "BEGIN_ACTION", payload: "restart" }]);
  });
});

describe("confirm dialog", () => {
  it("executes on y and cancels on n", () => {
    const state = createMockState({
      mode: "confirm",
      pendingAction: { phase: "confirming", action: "stop", unitName: "a.service" },
    });
    expect(press(state, "y").context.session.executePending).toHaveBeenCalledTimes(1);
    expect(dispatched(press(state, "n").context)).toEqual([{ type: "CLOSE_OVERLAY" }]);
  });

  it("only dismisses while the command runs", () => {
    const state = createMockState({
      mode: "confirm",
      pendingAction: { phase: "executing", action: "stop", unitName: "a.service", invocation: 1 },
    });
    const { context } = press(state, "y");
    expect(context.session.executePending).not.toHaveBeenCalled();
    expect(press(state, "", { escape: true }).context.session.dismissPending).toHaveBeenCalledTimes(1);
  });
});

describe("overlays", () => {
  it("scrolls the details view and closes on i", () => {
    const state = createMockState({ mode: "details" });
    expect(dispatched(press(state, "G").context)).toEqual([{ type: "SCROLL_OVERLAY", payload: "bottom" }]);
    expect(dispatched(press(state, "i").context)).toEqual([{ type: "CLOSE_OVERLAY" }]);
  });

  it("closes the unit file on c", () => {
    const state = createMockState({ mode: "unit-file" });
    expect(dispatched(press(state, "c").context)).toEqual([{ type: "CLOSE_OVERLAY" }]);
  });

  it("closes help on any key", () => {
    expect(dispatched(press(createMockState({ mode: "help" }), "x").context)).toEqual([{ type: "CLOSE_OVERLAY" }]);
  });
});
