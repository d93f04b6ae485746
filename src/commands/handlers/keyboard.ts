import type { Key } from "ink";
import type { PickerMode } from "../../types/domain";
import { actionForShortcut } from "../../services/picker-service";
import type { CommandContext, InputHandler } from "../types";

const isCtrlC = (input: string, key: Key) =>
  (key.ctrl && input === "c") || input === "\u0003";

/** Printable text, not a chord or a named key. */
const isText = (input: string, key: Key) =>
  input.length > 0 && !key.ctrl && !key.meta && !key.return && !key.tab && !key.escape;

const PICKER_KEYS: Record<PickerMode, string> = {
  "status-picker": "s",
  "category-picker": "t",
  "severity-picker": "p",
  "time-range-picker": "T",
  "file-state-picker": "f",
  "action-picker": "a",
};

const isPicker = (mode: string): mode is PickerMode => Object.hasOwn(PICKER_KEYS, mode);

export class UnitsInputHandler implements InputHandler {
  priority = 10;

  canHandle(context: CommandContext): boolean {
    return context.state.mode === "normal" && context.state.focus === "units";
  }

  handleInput(input: string, key: Key, context: CommandContext): boolean {
    const { state, dispatch } = context;
    const page = Math.max(1, state.layout.unitRows);

    if (input === "j" || key.downArrow) {
      dispatch({ type: "MOVE_SELECTION", payload: 1 });
      return true;
    }
    if (input === "k" || key.upArrow) {
      dispatch({ type: "MOVE_SELECTION", payload: -1 });
      return true;
    }
    if (input === "g") {
      dispatch({ type: "SELECT_FIRST" });
      return true;
    }
    if (input === "G") {
      dispatch({ type: "SELECT_LAST" });
      return true;
    }
    if (key.pageDown) {
      dispatch({ type: "PAGE_SELECTION", payload: page });
      return true;
    }
    if (key.pageUp) {
      dispatch({ type: "PAGE_SELECTION", payload: -page });
      return true;
    }
    if (key.escape) {
      if (!state.filters.searchQuery) return false;
      dispatch({ type: "CLEAR_SEARCH" });
      return true;
    }
    if (input === "l") {
      dispatch({ type: "SET_FOCUS", payload: "logs" });
      return true;
    }
    if (input === "r") {
      dispatch({ type: "REQUEST_RELOAD" });
      context.statusLog.info("Reloading units", { category: state.filters.category });
      return true;
    }
    if (input === "s") {
      dispatch({ type: "OPEN_PICKER", payload: "status-picker" });
      return true;
    }
    if (key.return) {
      dispatch({ type: "OPEN_DETAILS" });
      return true;
    }
    return false;
  }
}

export class LogsInputHandler implements InputHandler {
  priority = 10;

  canHandle(context: CommandContext): boolean {
    return context.state.mode === "normal" && context.state.focus === "logs";
  }

  handleInput(input: string, key: Key, context: CommandContext): boolean {
    const { state, dispatch } = context;
    const page = Math.max(1, state.layout.logRows);
    const half = Math.max(1, Math.floor(page / 2));

    if (key.ctrl && input === "d") {
      dispatch({ type: "SCROLL_LOGS", payload: half });
      return true;
    }
    if (key.ctrl && input === "u") {
      dispatch({ type: "SCROLL_LOGS", payload: -half });
      return true;
    }
    if (input === "j" || key.downArrow) {
      dispatch({ type: "SCROLL_LOGS", payload: 1 });
      return true;
    }
    if (input === "k" || key.upArrow) {
      dispatch({ type: "SCROLL_LOGS", payload: -1 });
      return true;
    }
    if (input === "g") {
      dispatch({ type: "SCROLL_LOGS_TOP" });
      return true;
    }
    if (input === "G") {
      dispatch({ type: "SCROLL_LOGS_BOTTOM" });
      return true;
    }
    if (key.pageDown) {
      dispatch({ type: "SCROLL_LOGS", payload: page });
      return true;
    }
    if (key.pageUp) {
      dispatch({ type: "SCROLL_LOGS", payload: -page });
      return true;
    }
    if (input === "n") {
      dispatch({ type: "NEXT_LOG_MATCH" });
      return true;
    }
    if (input === "N") {
      dispatch({ type: "PREV_LOG_MATCH" });
      return true;
    }
    if (input === "F") {
      dispatch({ type: "TOGGLE_LIVE_TAIL" });
      context.statusLog.set(state.logs.liveTail ? "Live tail off" : "Live tail on");
      return true;
    }
    if (key.escape) {
      if (state.logs.search.query) {
        dispatch({ type: "CLEAR_LOG_SEARCH" });
      } else {
        dispatch({ type: "SET_FOCUS", payload: "units" });
      }
      return true;
    }
    if (input === "l") {
      dispatch({ type: "SET_FOCUS", payload: "units" });
      return true;
    }
    return false;
  }
}

/**
 * Keys that open an overlay or switch scope, shared by both panes
 */
export class ModeInputHandler implements InputHandler {
  priority = 20;

  canHandle(context: CommandContext): boolean {
    return context.state.mode === "normal";
  }

  handleInput(input: string, key: Key, context: CommandContext): boolean {
    if (key.ctrl || key.meta) return false;
    const { state, dispatch } = context;

    switch (input) {
      case "?":
        dispatch({ type: "SET_MODE", payload: "help" });
        return true;
      case "/":
        dispatch({
          type: "SET_MODE",
          payload: state.focus === "logs" ? "log-search" : "search",
        });
        return true;
      case "u": {
        const scope = state.filters.scope === "system" ? "user" : "system";
        dispatch({ type: "SET_SCOPE", payload: scope });
        context.statusLog.info(`Switched to ${scope} units`);
        return true;
      }
      case "t":
        dispatch({ type: "OPEN_PICKER", payload: "category-picker" });
        return true;
      case "p":
        dispatch({ type: "OPEN_PICKER", payload: "severity-picker" });
        return true;
      case "T":
        dispatch({ type: "OPEN_PICKER", payload: "time-range-picker" });
        return true;
      case "f":
        dispatch({ type: "OPEN_PICKER", payload: "file-state-picker" });
        return true;
      case "a":
        dispatch({ type: "OPEN_PICKER", payload: "action-picker" });
        return true;
      case "D":
        dispatch({ type: "BEGIN_ACTION", payload: "daemon-reload" });
        return true;
      case "i":
        dispatch({ type: "OPEN_DETAILS" });
        return true;
      case "c":
        dispatch({ type: "OPEN_UNIT_FILE" });
        return true;
      default:
        return false;
    }
  }
}

export class SearchInputHandler implements InputHandler {
  priority = 30;

  canHandle(context: CommandContext): boolean {
    return context.state.mode === "search";
  }

  handleInput(input: string, key: Key, context: CommandContext): boolean {
    const { state, dispatch } = context;
    const query = state.filters.searchQuery;
    const page = Math.max(1, state.layout.unitRows);

    if (key.escape || key.return) {
      dispatch({ type: "SET_MODE", payload: "normal" });
      return true;
    }
    if (key.backspace || key.delete) {
      dispatch({ type: "SET_SEARCH_QUERY", payload: query.slice(0, -1) });
      return true;
    }
    if (key.downArrow) {
      dispatch({ type: "MOVE_SELECTION", payload: 1 });
      return true;
    }
    if (key.upArrow) {
      dispatch({ type: "MOVE_SELECTION", payload: -1 });
      return true;
    }
    if (key.pageDown || key.pageUp) {
      dispatch({ type: "PAGE_SELECTION", payload: key.pageDown ? page : -page });
      return true;
    }
    if (isText(input, key)) {
      dispatch({ type: "SET_SEARCH_QUERY", payload: query + input });
      return true;
    }
    return false;
  }
}

export class LogSearchInputHandler implements InputHandler {
  priority = 30;

  canHandle(context: CommandContext): boolean {
    return context.state.mode === "log-search";
  }

  handleInput(input: string, key: Key, context: CommandContext): boolean {
    const { state, dispatch } = context;
    const query = state.logs.search.query;
    const page = Math.max(1, state.layout.logRows);

    if (key.escape || key.return) {
      dispatch({ type: "SET_MODE", payload: "normal" });
      return true;
    }
    if (key.backspace || key.delete) {
      dispatch({ type: "SET_LOG_SEARCH_QUERY", payload: query.slice(0, -1) });
      return true;
    }
    if (key.downArrow || key.upArrow) {
      dispatch({ type: "SCROLL_LOGS", payload: key.downArrow ? 1 : -1 });
      return true;
    }
    if (key.pageDown || key.pageUp) {
      dispatch({ type: "SCROLL_LOGS", payload: key.pageDown ? page : -page });
      return true;
    }
    if (isText(input, key)) {
      dispatch({ type: "SET_LOG_SEARCH_QUERY", payload: query + input });
      return true;
    }
    return false;
  }
}

export class PickerInputHandler implements InputHandler {
  priority = 30;

  canHandle(context: CommandContext): boolean {
    return isPicker(context.state.mode);
  }

  handleInput(input: string, key: Key, context: CommandContext): boolean {
    const { state, dispatch } = context;
    const mode = state.mode;
    if (!isPicker(mode) || key.ctrl) return false;

    if (mode === "action-picker") {
      const action = actionForShortcut(state.modals.actionOptions, input);
      if (action) {
        dispatch({ type: "BEGIN_ACTION", payload: action });
        return true;
      }
    }
    if (input === "j" || key.downArrow) {
      dispatch({ type: "PICKER_MOVE", payload: 1 });
      return true;
    }
    if (input === "k" || key.upArrow) {
      dispatch({ type: "PICKER_MOVE", payload: -1 });
      return true;
    }
    if (key.return) {
      dispatch({ type: "CONFIRM_PICKER" });
      return true;
    }
    if (key.escape || input === PICKER_KEYS[mode]) {
      dispatch({ type: "CLOSE_OVERLAY" });
      return true;
    }
    // everything else is swallowed while a picker is open
    return true;
  }
}

export class ConfirmInputHandler implements InputHandler {
  priority = 30;

  canHandle(context: CommandContext): boolean {
    return context.state.mode === "confirm";
  }

  handleInput(input: string, key: Key, context: CommandContext): boolean {
    const { state, dispatch, session } = context;
    if (key.ctrl) return false;

    switch (state.pendingAction.phase) {
      case "confirming":
        if (input === "y" || key.return) {
          session.executePending();
        } else if (input === "n" || key.escape) {
          dispatch({ type: "CLOSE_OVERLAY" });
        }
        return true;
      case "executing":
        if (key.escape) session.dismissPending();
        return true;
      case "settled":
        if (key.return || key.escape) session.dismissPending();
        return true;
      case "idle":
        dispatch({ type: "CLOSE_OVERLAY" });
        return true;
    }
  }
}

export class OverlayInputHandler implements InputHandler {
  priority = 30;

  canHandle(context: CommandContext): boolean {
    const { mode } = context.state;
    return mode === "details" || mode === "unit-file";
  }

  handleInput(input: string, key: Key, context: CommandContext): boolean {
    const { state, dispatch } = context;
    if (key.ctrl) return false;
    const page = Math.max(1, state.layout.detailRows);
    const closeKey = state.mode === "details" ? input === "i" || key.return : input === "c";

    if (key.escape || closeKey) {
      dispatch({ type: "CLOSE_OVERLAY" });
    } else if (input === "j" || key.downArrow) {
      dispatch({ type: "SCROLL_OVERLAY", payload: 1 });
    } else if (input === "k" || key.upArrow) {
      dispatch({ type: "SCROLL_OVERLAY", payload: -1 });
    } else if (input === "g") {
      dispatch({ type: "SCROLL_OVERLAY", payload: "top" });
    } else if (input === "G") {
      dispatch({ type: "SCROLL_OVERLAY", payload: "bottom" });
    } else if (key.pageDown) {
      dispatch({ type: "SCROLL_OVERLAY", payload: page });
    } else if (key.pageUp) {
      dispatch({ type: "SCROLL_OVERLAY", payload: -page });
    }
    return true;
  }
}

export class HelpInputHandler implements InputHandler {
  priority = 40;

  canHandle(context: CommandContext): boolean {
    return context.state.mode === "help";
  }

  handleInput(input: string, key: Key, context: CommandContext): boolean {
    if (isCtrlC(input, key)) return false;
    context.dispatch({ type: "CLOSE_OVERLAY" });
    return true;
  }
}

export class GlobalInputHandler implements InputHandler {
  priority = 0; // Lowest priority - catches global inputs

  canHandle(_context: CommandContext): boolean {
    return true;
  }

  handleInput(input: string, key: Key, context: CommandContext): boolean {
    if (isCtrlC(input, key)) {
      context.cleanupAndExit();
      return true;
    }
    if (input === "q" && context.state.mode === "normal") {
      context.cleanupAndExit();
      return true;
    }
    return false;
  }
}

export function defaultInputHandlers(): InputHandler[] {
  return [
    new GlobalInputHandler(),
    new UnitsInputHandler(),
    new LogsInputHandler(),
    new ModeInputHandler(),
    new SearchInputHandler(),
    new LogSearchInputHandler(),
    new PickerInputHandler(),
    new ConfirmInputHandler(),
    new OverlayInputHandler(),
    new HelpInputHandler(),
  ];
}
