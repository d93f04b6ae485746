import type { Scope, Unit, UnitCategory } from '../types/domain';

export interface FilterCriteria {
  searchQuery: string;
  subState: string | null;
  fileState: string | null;
}

export interface FilterState extends FilterCriteria {
  units: Unit[];
  category: UnitCategory;
  scope: Scope;
  /** Strictly increasing indices into `units`. */
  filteredIndices: number[];
  /** Index into `filteredIndices`, or null when nothing is selected. */
  selectedIdx: number | null;
  fetchError: string | null;
  /** Set when the inventory must be (re)fetched for the current category and scope. */
  stale: boolean;
  loading: boolean;
}

export type FilterAction =
  | { type: 'SET_UNITS'; payload: Unit[] }
  | { type: 'SET_FETCH_ERROR'; payload: string }
  | { type: 'INVENTORY_REQUESTED' }
  | { type: 'REQUEST_RELOAD' }
  | { type: 'SET_SEARCH_QUERY'; payload: string }
  | { type: 'SET_SUB_STATE_FILTER'; payload: string | null }
  | { type: 'SET_FILE_STATE_FILTER'; payload: string | null }
  | { type: 'CLEAR_SEARCH' }
  | { type: 'SET_CATEGORY'; payload: UnitCategory }
  | { type: 'SET_SCOPE'; payload: Scope }
  | { type: 'MOVE_SELECTION'; payload: number }
  | { type: 'PAGE_SELECTION'; payload: number }
  | { type: 'SELECT_FIRST' }
  | { type: 'SELECT_LAST' };

export const initialFilterState: FilterState = {
  units: [],
  category: 'service',
  scope: 'system',
  searchQuery: '',
  subState: null,
  fileState: null,
  filteredIndices: [],
  selectedIdx: null,
  fetchError: null,
  stale: true,
  loading: false,
};

export function matchesText(unit: Unit, query: string): boolean {
  if (!query) return true;
  const q = query.toLowerCase();
  return unit.name.toLowerCase().includes(q) || unit.description.toLowerCase().includes(q);
}

export function matchesSubState(unit: Unit, subState: string | null): boolean {
  return subState === null || unit.subState === subState;
}

export function matchesFileState(unit: Unit, fileState: string | null): boolean {
  return fileState === null || unit.fileState === fileState;
}

/**
 * Indices of units passing every active predicate, in original order
 * Text, then sub-state, then file-state
 */
export function computeFilteredIndices(units: readonly Unit[], criteria: FilterCriteria): number[] {
  const out: number[] = [];
  units.forEach((unit, i) => {
    if (
      matchesText(unit, criteria.searchQuery) &&
      matchesSubState(unit, criteria.subState) &&
      matchesFileState(unit, criteria.fileState)
    ) {
      out.push(i);
    }
  });
  return out;
}

export function selectedUnit(state: FilterState): Unit | null {
  if (state.selectedIdx === null) return null;
  const unitIdx = state.filteredIndices[state.selectedIdx];
  return unitIdx === undefined ? null : state.units[unitIdx] ?? null;
}

export function visibleUnits(state: FilterState): Unit[] {
  return state.filteredIndices.map((i) => state.units[i]);
}

/**
 * Recompute the filtered view and carry the selection over:
 * the previously selected unit stays selected while it still matches,
 * otherwise the first result is selected, or nothing when there are none.
 */
function refilter(state: FilterState, units: Unit[] = state.units): FilterState {
  const previous = selectedUnit(state);
  const filteredIndices = computeFilteredIndices(units, state);

  let selectedIdx: number | null = null;
  if (filteredIndices.length > 0) {
    const kept = previous
      ? filteredIndices.findIndex((i) => units[i].name === previous.name)
      : -1;
    selectedIdx = kept >= 0 ? kept : 0;
  }

  return { ...state, units, filteredIndices, selectedIdx };
}

function resetForInventory(state: FilterState): FilterState {
  return {
    ...state,
    units: [],
    searchQuery: '',
    subState: null,
    fileState: null,
    filteredIndices: [],
    selectedIdx: null,
    fetchError: null,
    stale: true,
  };
}

/**
 * Pure reducer for the unit inventory, its filters and the selection cursor
 */
export function filterReducer(state: FilterState, action: FilterAction): FilterState {
  switch (action.type) {
    case 'SET_UNITS':
      return refilter({ ...state, fetchError: null, loading: false }, action.payload);

    case 'SET_FETCH_ERROR':
      return { ...state, fetchError: action.payload, loading: false };

    case 'INVENTORY_REQUESTED':
      return { ...state, stale: false, loading: true };

    case 'REQUEST_RELOAD':
      return { ...state, stale: true };

    case 'SET_SEARCH_QUERY':
      return refilter({ ...state, searchQuery: action.payload });

    case 'SET_SUB_STATE_FILTER':
      return refilter({ ...state, subState: action.payload });

    case 'SET_FILE_STATE_FILTER':
      return refilter({ ...state, fileState: action.payload });

    case 'CLEAR_SEARCH':
      return refilter({ ...state, searchQuery: '' });

    case 'SET_CATEGORY':
      if (action.payload === state.category) return state;
      return { ...resetForInventory(state), category: action.payload };

    case 'SET_SCOPE':
      if (action.payload === state.scope) return state;
      return { ...resetForInventory(state), scope: action.payload };

    case 'MOVE_SELECTION': {
      const len = state.filteredIndices.length;
      if (len === 0) return state;
      if (state.selectedIdx === null) return { ...state, selectedIdx: 0 };
      const next = (((state.selectedIdx + action.payload) % len) + len) % len;
      return { ...state, selectedIdx: next };
    }

    case 'PAGE_SELECTION': {
      const len = state.filteredIndices.length;
      if (len === 0) return state;
      const current = state.selectedIdx ?? 0;
      return { ...state, selectedIdx: Math.max(0, Math.min(current + action.payload, len - 1)) };
    }

    case 'SELECT_FIRST':
      if (state.filteredIndices.length === 0) return state;
      return { ...state, selectedIdx: 0 };

    case 'SELECT_LAST':
      if (state.filteredIndices.length === 0) return state;
      return { ...state, selectedIdx: state.filteredIndices.length - 1 };

    default:
      return state;
  }
}
