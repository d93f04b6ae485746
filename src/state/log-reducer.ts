import {
  type ContinuityState,
  type Discontinuity,
  detectDiscontinuities,
  findMatches,
  type HeightAt,
  recordHeight,
  resolveBottomIndex,
  resolveTopIndex,
  type ScrollAnchor,
  visibleEnd,
} from '../services/log-viewport';
import type { LogRecord, TimeRange } from '../types/domain';

export interface LogSearchState {
  query: string;
  matches: number[];
  /** Position in `matches`, not a record index. */
  current: number | null;
}

export interface LogViewportState {
  unitName: string | null;
  records: LogRecord[];
  markers: (Discontinuity | null)[];
  continuity: ContinuityState;
  scroll: ScrollAnchor;
  liveTail: boolean;
  dirty: boolean;
  loading: boolean;
  severity: number | null;
  timeRange: TimeRange;
  search: LogSearchState;
  viewport: { rows: number; cols: number };
}

export type LogAction =
  | { type: 'LOGS_REQUESTED'; payload: { unitName: string } }
  | { type: 'LOGS_LOADED'; payload: { unitName: string; records: LogRecord[] } }
  | { type: 'LOGS_LOAD_FAILED'; payload: { unitName: string; message: string } }
  | { type: 'LOGS_APPENDED'; payload: { unitName: string; records: LogRecord[] } }
  | { type: 'LOGS_CLEARED' }
  | { type: 'SET_LOG_VIEWPORT'; payload: { rows: number; cols: number } }
  | { type: 'SCROLL_LOGS'; payload: number }
  | { type: 'SCROLL_LOGS_TOP' }
  | { type: 'SCROLL_LOGS_BOTTOM' }
  | { type: 'TOGGLE_LIVE_TAIL' }
  | { type: 'SET_LOG_SEARCH_QUERY'; payload: string }
  | { type: 'NEXT_LOG_MATCH' }
  | { type: 'PREV_LOG_MATCH' }
  | { type: 'CLEAR_LOG_SEARCH' }
  | { type: 'SET_SEVERITY'; payload: number | null }
  | { type: 'SET_TIME_RANGE'; payload: TimeRange };

const emptySearch: LogSearchState = { query: '', matches: [], current: null };

export const initialLogViewportState: LogViewportState = {
  unitName: null,
  records: [],
  markers: [],
  continuity: {},
  scroll: { kind: 'track-latest' },
  liveTail: true,
  dirty: false,
  loading: false,
  severity: null,
  timeRange: 'all',
  search: emptySearch,
  viewport: { rows: 10, cols: 80 },
};

export function heightsOf(state: LogViewportState): HeightAt {
  return (i) => recordHeight(state.records[i], state.markers[i], state.viewport.cols);
}

export function bottomIndex(state: LogViewportState): number {
  return resolveBottomIndex(state.records.length, heightsOf(state), state.viewport.rows);
}

/** Index of the first record on screen for the current anchor and geometry. */
export function topIndex(state: LogViewportState): number {
  return resolveTopIndex(state.scroll, state.records.length, heightsOf(state), state.viewport.rows);
}

/** The `[start, end)` slice of records the renderer should draw. */
export function visibleWindow(state: LogViewportState): { start: number; end: number } {
  const start = topIndex(state);
  const end = visibleEnd(start, state.records.length, heightsOf(state), state.viewport.rows);
  return { start, end };
}

/** Cursor to resume from, when tailing is possible. */
export function tailCursor(state: LogViewportState): string | null {
  const last = state.records[state.records.length - 1];
  return last?.cursor ?? null;
}

export function needsLoad(state: LogViewportState, selectedUnit: string | null): boolean {
  if (selectedUnit === null) return false;
  return state.dirty || state.unitName !== selectedUnit;
}

function discardBuffer(state: LogViewportState): LogViewportState {
  return {
    ...state,
    records: [],
    markers: [],
    continuity: {},
    scroll: { kind: 'track-latest' },
    search: emptySearch,
  };
}

function jumpTo(state: LogViewportState, index: number): LogViewportState {
  const clamped = Math.max(0, Math.min(index, bottomIndex(state)));
  return { ...state, scroll: { kind: 'fixed', index: clamped }, liveTail: false };
}

function revealMatch(state: LogViewportState, position: number): LogViewportState {
  const next = { ...state, search: { ...state.search, current: position } };
  const target = state.search.matches[position];
  const { start, end } = visibleWindow(next);
  if (target >= start && target < end) return next;
  return jumpTo(next, target);
}

/**
 * Pure reducer for the log viewport
 * Owns the buffer of one unit, its scroll anchor, search and tail flags
 */
export function logReducer(state: LogViewportState, action: LogAction): LogViewportState {
  switch (action.type) {
    case 'LOGS_REQUESTED':
      return {
        ...discardBuffer(state),
        unitName: action.payload.unitName,
        liveTail: true,
        dirty: false,
        loading: true,
      };

    case 'LOGS_LOADED': {
      if (action.payload.unitName !== state.unitName) return state;
      const { markers, state: continuity } = detectDiscontinuities(action.payload.records);
      return {
        ...state,
        records: action.payload.records,
        markers,
        continuity,
        loading: false,
      };
    }

    case 'LOGS_LOAD_FAILED':
      if (action.payload.unitName !== state.unitName) return state;
      return {
        ...state,
        records: [{ message: `Error fetching logs: ${action.payload.message}`, severity: 3 }],
        markers: [null],
        continuity: {},
        loading: false,
      };

    case 'LOGS_APPENDED': {
      const { unitName, records } = action.payload;
      if (unitName !== state.unitName || records.length === 0) return state;

      const offset = state.records.length;
      const { markers, state: continuity } = detectDiscontinuities(records, state.continuity);
      const search = state.search.query
        ? {
            ...state.search,
            matches: [...state.search.matches, ...findMatches(records, state.search.query, offset)],
          }
        : state.search;

      return {
        ...state,
        records: [...state.records, ...records],
        markers: [...state.markers, ...markers],
        continuity,
        search,
      };
    }

    case 'LOGS_CLEARED':
      return { ...discardBuffer(state), unitName: null, loading: false, dirty: false };

    case 'SET_LOG_VIEWPORT':
      if (
        action.payload.rows === state.viewport.rows &&
        action.payload.cols === state.viewport.cols
      ) {
        return state;
      }
      return { ...state, viewport: action.payload };

    case 'SCROLL_LOGS':
      if (state.records.length === 0) return state;
      return jumpTo(state, topIndex(state) + action.payload);

    case 'SCROLL_LOGS_TOP':
      if (state.records.length === 0) return state;
      return jumpTo(state, 0);

    case 'SCROLL_LOGS_BOTTOM':
      return { ...state, scroll: { kind: 'track-latest' } };

    case 'TOGGLE_LIVE_TAIL':
      if (state.liveTail) return { ...state, liveTail: false };
      return { ...state, liveTail: true, scroll: { kind: 'track-latest' } };

    case 'SET_LOG_SEARCH_QUERY': {
      const query = action.payload;
      const matches = findMatches(state.records, query);
      const next: LogViewportState = { ...state, search: { query, matches, current: null } };
      if (matches.length === 0) return next;
      return jumpTo({ ...next, search: { ...next.search, current: 0 } }, matches[0]);
    }

    case 'NEXT_LOG_MATCH': {
      const { matches, current } = state.search;
      if (matches.length === 0) return state;
      const position = current === null ? 0 : (current + 1) % matches.length;
      return revealMatch(state, position);
    }

    case 'PREV_LOG_MATCH': {
      const { matches, current } = state.search;
      if (matches.length === 0) return state;
      const position = current === null || current === 0 ? matches.length - 1 : current - 1;
      return revealMatch(state, position);
    }

    case 'CLEAR_LOG_SEARCH':
      return { ...state, search: emptySearch };

    case 'SET_SEVERITY':
      if (action.payload === state.severity) return state;
      return { ...discardBuffer(state), severity: action.payload, dirty: true };

    case 'SET_TIME_RANGE':
      if (action.payload === state.timeRange) return state;
      return { ...discardBuffer(state), timeRange: action.payload, dirty: true };

    default:
      return state;
  }
}
