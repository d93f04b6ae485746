import React, {
  createContext,
  type ReactNode,
  useContext,
  useReducer,
} from "react";
import {
  type PickerContext,
  preselectIndex,
  pickerOptions,
  selectionAt,
  stepCursor,
} from "../services/picker-service";
import {
  initialPendingActionState,
  type PendingActionAction,
  type PendingActionState,
  pendingActionReducer,
} from "../state/action-reducer";
import {
  type FilterAction,
  type FilterState,
  filterReducer,
  initialFilterState,
  selectedUnit,
} from "../state/filter-reducer";
import {
  initialLogViewportState,
  type LogAction,
  type LogViewportState,
  logReducer,
} from "../state/log-reducer";
import {
  initialModalState,
  type ModalState,
  modalReducer,
} from "../state/modal-reducer";
import {
  initialPropertiesState,
  type PropertiesAction,
  type PropertiesState,
  propertiesReducer,
} from "../state/properties-reducer";
import {
  initialUIState,
  type UIAction,
  type UIState,
  uiReducer,
} from "../state/ui-reducer";
import type {
  Focus,
  Mode,
  PickerMode,
  Scope,
  Unit,
  UnitAction,
  UnitCategory,
} from "../types/domain";
import type { ActionOutcome } from "../types/sources";
import { availableActions, isHostWide } from "../utils/catalog";
import { buildDetailLines } from "../utils/details";

// Re-export types from individual reducers
export type {
  FilterState,
  LogViewportState,
  ModalState,
  PendingActionState,
  PropertiesState,
  UIState,
};

export interface TerminalState {
  rows: number;
  cols: number;
}

/** Visible line counts reported by the layout on every frame. */
export interface LayoutState {
  unitRows: number;
  logRows: number;
  logCols: number;
  detailRows: number;
}

export interface AppState {
  mode: Mode;
  focus: Focus;
  terminal: TerminalState;
  layout: LayoutState;
  filters: FilterState;
  logs: LogViewportState;
  modals: ModalState;
  properties: PropertiesState;
  pendingAction: PendingActionState;
  ui: UIState;
}

export type ScrollTarget = number | "top" | "bottom";

export type AppAction =
  | { type: "SET_MODE"; payload: "normal" | "search" | "log-search" | "help" }
  | { type: "SET_FOCUS"; payload: Focus }
  | { type: "SET_TERMINAL_SIZE"; payload: TerminalState }
  | { type: "SET_LAYOUT"; payload: LayoutState }
  | {
      type: "INVENTORY_LOADED";
      payload: { category: UnitCategory; scope: Scope; units: Unit[] };
    }
  | {
      type: "INVENTORY_FAILED";
      payload: { category: UnitCategory; scope: Scope; message: string };
    }
  | { type: "OPEN_PICKER"; payload: PickerMode }
  | { type: "PICKER_MOVE"; payload: number }
  | { type: "CONFIRM_PICKER" }
  | { type: "CLOSE_OVERLAY" }
  | { type: "BEGIN_ACTION"; payload: UnitAction }
  | { type: "ACTION_STARTED"; payload: { invocation: number } }
  | {
      type: "ACTION_SETTLED";
      payload: { invocation: number; outcome: ActionOutcome };
    }
  | { type: "DISMISS_ACTION" }
  | { type: "OPEN_DETAILS" }
  | { type: "OPEN_UNIT_FILE" }
  | { type: "UNIT_FILE_LOADED"; payload: { unitName: string; lines: string[] } }
  | { type: "UNIT_FILE_FAILED"; payload: { unitName: string; message: string } }
  | { type: "SCROLL_OVERLAY"; payload: ScrollTarget }
  | FilterAction
  | LogAction
  | PropertiesAction
  | UIAction;

export const initialState: AppState = {
  mode: "normal",
  focus: "units",
  terminal: {
    rows: process.stdout.rows || 24,
    cols: process.stdout.columns || 80,
  },
  layout: { unitRows: 10, logRows: 10, logCols: 80, detailRows: 10 },
  filters: initialFilterState,
  logs: initialLogViewportState,
  modals: initialModalState,
  properties: initialPropertiesState,
  pendingAction: initialPendingActionState,
  ui: initialUIState,
};

function pickerContext(state: AppState): PickerContext {
  return {
    filters: state.filters,
    logs: state.logs,
    actionOptions: state.modals.actionOptions,
  };
}

export function isPickerMode(mode: Mode): mode is PickerMode {
  return mode.endsWith("-picker");
}

/** Category or scope changed: everything derived from the old inventory goes. */
function switchInventory(state: AppState, action: FilterAction): AppState {
  const filters = filterReducer(state.filters, action);
  if (filters === state.filters) return state;
  return {
    ...state,
    filters,
    logs: logReducer(state.logs, { type: "LOGS_CLEARED" }),
    properties: propertiesReducer(state.properties, {
      type: "CLEAR_PROPERTIES",
    }),
    modals: { ...state.modals, detailsUnit: null, unitFile: null },
  };
}

function withPending(
  state: AppState,
  action: PendingActionAction,
): PendingActionState {
  return pendingActionReducer(state.pendingAction, action);
}

function beginAction(state: AppState, action: UnitAction): AppState {
  let unitName = "";
  if (!isHostWide(action)) {
    const unit = selectedUnit(state.filters);
    if (!unit) return state;
    unitName = unit.name;
  }
  const pendingAction = withPending(state, {
    type: "ACTION_CONFIRMING",
    payload: { action, unitName },
  });
  if (pendingAction === state.pendingAction) return state;
  return { ...state, pendingAction, mode: "confirm" };
}

function applyPicker(state: AppState): AppState {
  if (!isPickerMode(state.mode)) return state;
  const selection = selectionAt(
    state.mode,
    state.modals.pickerCursor,
    pickerContext(state),
  );
  const closed: AppState = { ...state, mode: "normal" };
  if (!selection) return closed;

  switch (selection.kind) {
    case "sub-state":
      return {
        ...closed,
        filters: filterReducer(state.filters, {
          type: "SET_SUB_STATE_FILTER",
          payload: selection.value,
        }),
      };
    case "file-state":
      return {
        ...closed,
        filters: filterReducer(state.filters, {
          type: "SET_FILE_STATE_FILTER",
          payload: selection.value,
        }),
      };
    case "category":
      return switchInventory(closed, {
        type: "SET_CATEGORY",
        payload: selection.value,
      });
    case "severity":
      return {
        ...closed,
        logs: logReducer(state.logs, {
          type: "SET_SEVERITY",
          payload: selection.value,
        }),
      };
    case "time-range":
      return {
        ...closed,
        logs: logReducer(state.logs, {
          type: "SET_TIME_RANGE",
          payload: selection.value,
        }),
      };
    case "action":
      return beginAction(closed, selection.value);
  }
}

function scrollTo(target: ScrollTarget, current: number, max: number): number {
  if (target === "top") return 0;
  if (target === "bottom") return max;
  return Math.max(0, Math.min(current + target, max));
}

function scrollOverlay(state: AppState, target: ScrollTarget): AppState {
  const rows = state.layout.detailRows;

  if (state.mode === "details") {
    const unit = state.filters.units.find(
      (u) => u.name === state.modals.detailsUnit,
    );
    const count = unit
      ? buildDetailLines(unit, state.properties.cache.get(unit.name) ?? null)
          .length
      : 0;
    const max = Math.max(0, count - rows);
    return {
      ...state,
      modals: modalReducer(state.modals, {
        type: "SET_DETAIL_SCROLL",
        payload: scrollTo(target, state.modals.detailScroll, max),
      }),
    };
  }

  if (state.mode === "unit-file" && state.modals.unitFile) {
    const count = state.modals.unitFile.lines?.length ?? 1;
    const max = Math.max(0, count - rows);
    return {
      ...state,
      modals: modalReducer(state.modals, {
        type: "SET_UNIT_FILE_SCROLL",
        payload: scrollTo(target, state.modals.unitFile.scroll, max),
      }),
    };
  }

  return state;
}

/**
 * Root reducer. Single-slice actions are routed to their reducer;
 * the ones that touch several slices are resolved here in one step.
 */
export function appStateReducer(state: AppState, action: AppAction): AppState {
  switch (action.type) {
    case "SET_MODE":
      if (action.payload === "help" && state.mode !== "normal") return state;
      return { ...state, mode: action.payload };

    case "SET_FOCUS":
      return { ...state, focus: action.payload };

    case "SET_TERMINAL_SIZE":
      return { ...state, terminal: { ...state.terminal, ...action.payload } };

    case "SET_LAYOUT": {
      const logs = logReducer(state.logs, {
        type: "SET_LOG_VIEWPORT",
        payload: { rows: action.payload.logRows, cols: action.payload.logCols },
      });
      return { ...state, layout: action.payload, logs };
    }

    case "INVENTORY_LOADED": {
      const { category, scope, units } = action.payload;
      if (category !== state.filters.category || scope !== state.filters.scope) {
        return state;
      }
      return {
        ...state,
        filters: filterReducer(state.filters, {
          type: "SET_UNITS",
          payload: units,
        }),
      };
    }

    case "INVENTORY_FAILED": {
      const { category, scope, message } = action.payload;
      if (category !== state.filters.category || scope !== state.filters.scope) {
        return state;
      }
      return {
        ...state,
        filters: filterReducer(state.filters, {
          type: "SET_FETCH_ERROR",
          payload: message,
        }),
      };
    }

    case "OPEN_PICKER": {
      if (state.mode !== "normal") return state;
      const mode = action.payload;
      let modals = state.modals;
      if (mode === "action-picker") {
        if (state.pendingAction.phase !== "idle") return state;
        const unit = selectedUnit(state.filters);
        if (!unit) return state;
        modals = modalReducer(modals, {
          type: "SET_ACTION_OPTIONS",
          payload: availableActions(unit.subState, unit.fileState),
        });
      }
      const next: AppState = { ...state, mode, modals };
      return {
        ...next,
        modals: modalReducer(modals, {
          type: "SET_PICKER_CURSOR",
          payload: preselectIndex(mode, pickerContext(next)),
        }),
      };
    }

    case "PICKER_MOVE": {
      if (!isPickerMode(state.mode)) return state;
      const count = pickerOptions(state.mode, pickerContext(state)).length;
      return {
        ...state,
        modals: modalReducer(state.modals, {
          type: "SET_PICKER_CURSOR",
          payload: stepCursor(state.modals.pickerCursor, action.payload, count),
        }),
      };
    }

    case "CONFIRM_PICKER":
      return applyPicker(state);

    case "CLOSE_OVERLAY":
      if (state.mode === "confirm") {
        return {
          ...state,
          mode: "normal",
          pendingAction: withPending(state, { type: "ACTION_DISMISSED" }),
        };
      }
      return { ...state, mode: "normal" };

    case "BEGIN_ACTION":
      if (state.mode !== "normal" && state.mode !== "action-picker") {
        return state;
      }
      return beginAction(state, action.payload);

    case "ACTION_STARTED":
      return {
        ...state,
        pendingAction: withPending(state, {
          type: "ACTION_EXECUTING",
          payload: action.payload,
        }),
      };

    case "ACTION_SETTLED":
      return {
        ...state,
        pendingAction: withPending(state, action),
      };

    case "DISMISS_ACTION":
      return {
        ...state,
        mode: state.mode === "confirm" ? "normal" : state.mode,
        pendingAction: withPending(state, { type: "ACTION_DISMISSED" }),
      };

    case "OPEN_DETAILS": {
      if (state.mode !== "normal") return state;
      const unit = selectedUnit(state.filters);
      if (!unit) return state;
      return {
        ...state,
        mode: "details",
        modals: modalReducer(state.modals, {
          type: "SET_DETAILS_UNIT",
          payload: unit.name,
        }),
      };
    }

    case "OPEN_UNIT_FILE": {
      if (state.mode !== "normal") return state;
      const unit = selectedUnit(state.filters);
      if (!unit) return state;
      return {
        ...state,
        mode: "unit-file",
        modals: modalReducer(state.modals, {
          type: "SET_UNIT_FILE",
          payload: { unitName: unit.name, lines: null, error: null, scroll: 0 },
        }),
      };
    }

    case "UNIT_FILE_LOADED":
    case "UNIT_FILE_FAILED":
      return { ...state, modals: modalReducer(state.modals, action) };

    case "SCROLL_OVERLAY":
      return scrollOverlay(state, action.payload);

    case "SET_CATEGORY":
    case "SET_SCOPE":
      return switchInventory(state, action);

    case "SET_UNITS":
    case "SET_FETCH_ERROR":
    case "INVENTORY_REQUESTED":
    case "REQUEST_RELOAD":
    case "SET_SEARCH_QUERY":
    case "SET_SUB_STATE_FILTER":
    case "SET_FILE_STATE_FILTER":
    case "CLEAR_SEARCH":
    case "MOVE_SELECTION":
    case "PAGE_SELECTION":
    case "SELECT_FIRST":
    case "SELECT_LAST":
      return { ...state, filters: filterReducer(state.filters, action) };

    case "LOGS_REQUESTED":
    case "LOGS_LOADED":
    case "LOGS_LOAD_FAILED":
    case "LOGS_APPENDED":
    case "LOGS_CLEARED":
    case "SET_LOG_VIEWPORT":
    case "SCROLL_LOGS":
    case "SCROLL_LOGS_TOP":
    case "SCROLL_LOGS_BOTTOM":
    case "TOGGLE_LIVE_TAIL":
    case "SET_LOG_SEARCH_QUERY":
    case "NEXT_LOG_MATCH":
    case "PREV_LOG_MATCH":
    case "CLEAR_LOG_SEARCH":
    case "SET_SEVERITY":
    case "SET_TIME_RANGE":
      return { ...state, logs: logReducer(state.logs, action) };

    case "PROPERTIES_LOADED": {
      const { category, scope } = action.payload;
      if (category !== state.filters.category || scope !== state.filters.scope) {
        return state;
      }
      return {
        ...state,
        properties: propertiesReducer(state.properties, action),
      };
    }

    case "PROPERTIES_REQUESTED":
    case "CLEAR_PROPERTIES":
      return {
        ...state,
        properties: propertiesReducer(state.properties, action),
      };

    case "SET_STATUS":
    case "TOGGLE_INDICATOR":
      return { ...state, ui: uiReducer(state.ui, action) };

    default:
      return state;
  }
}

// Context
export const AppStateContext = createContext<{
  state: AppState;
  dispatch: React.Dispatch<AppAction>;
} | null>(null);

export interface AppStateProviderProps {
  children: ReactNode;
  initialState?: Partial<AppState>;
}

export const AppStateProvider: React.FC<AppStateProviderProps> = ({
  children,
  initialState: providedInitialState,
}) => {
  const finalInitialState = providedInitialState
    ? {
        ...initialState,
        ...providedInitialState,
        filters: {
          ...initialState.filters,
          ...(providedInitialState.filters ?? {}),
        },
        logs: { ...initialState.logs, ...(providedInitialState.logs ?? {}) },
        modals: {
          ...initialState.modals,
          ...(providedInitialState.modals ?? {}),
        },
        ui: { ...initialState.ui, ...(providedInitialState.ui ?? {}) },
      }
    : initialState;

  const [state, dispatch] = useReducer(appStateReducer, finalInitialState);

  return (
    <AppStateContext.Provider value={{ state, dispatch }}>
      {children}
    </AppStateContext.Provider>
  );
};

export const useAppState = () => {
  const context = useContext(AppStateContext);
  if (!context) {
    throw new Error("useAppState must be used within an AppStateProvider");
  }
  return context;
};

// Convenience selector hooks
export const useMode = () => {
  const { state } = useAppState();
  return state.mode;
};

export const useFilters = () => {
  const { state } = useAppState();
  return state.filters;
};

export const useLogs = () => {
  const { state } = useAppState();
  return state.logs;
};

export const useTerminal = () => {
  const { state } = useAppState();
  return state.terminal;
};

export const useUI = () => {
  const { state } = useAppState();
  return state.ui;
};

export const usePendingAction = () => {
  const { state } = useAppState();
  return state.pendingAction;
};
