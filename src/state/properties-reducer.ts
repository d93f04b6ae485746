import type { Scope, UnitCategory, UnitProperties } from '../types/domain';

export interface PropertiesState {
  /** Property sheets keyed by unit name, valid for the current category and scope. */
  cache: ReadonlyMap<string, UnitProperties>;
  pending: string | null;
}

export type PropertiesAction =
  | { type: 'PROPERTIES_REQUESTED'; payload: string }
  | {
      type: 'PROPERTIES_LOADED';
      payload: { unitName: string; scope: Scope; category: UnitCategory; properties: UnitProperties };
    }
  | { type: 'CLEAR_PROPERTIES' };

export const initialPropertiesState: PropertiesState = {
  cache: new Map(),
  pending: null,
};

/**
 * Pure reducer for the per-session property sheet cache
 */
export function propertiesReducer(
  state: PropertiesState,
  action: PropertiesAction,
): PropertiesState {
  switch (action.type) {
    case 'PROPERTIES_REQUESTED':
      return { ...state, pending: action.payload };

    case 'PROPERTIES_LOADED': {
      const cache = new Map(state.cache);
      cache.set(action.payload.unitName, action.payload.properties);
      const pending = state.pending === action.payload.unitName ? null : state.pending;
      return { cache, pending };
    }

    case 'CLEAR_PROPERTIES':
      return { cache: new Map(), pending: null };

    default:
      return state;
  }
}
