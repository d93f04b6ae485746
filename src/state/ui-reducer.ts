export interface UIState {
  status: string;
  /** Phase of the blinking progress indicator. */
  indicatorOn: boolean;
}

export type UIAction =
  | { type: 'SET_STATUS'; payload: string }
  | { type: 'TOGGLE_INDICATOR' };

export const initialUIState: UIState = {
  status: 'Starting…',
  indicatorOn: true,
};

/**
 * Pure reducer for UI state
 * Handles the status line and the progress indicator
 */
export function uiReducer(state: UIState, action: UIAction): UIState {
  switch (action.type) {
    case 'SET_STATUS':
      return { ...state, status: action.payload };

    case 'TOGGLE_INDICATOR':
      return { ...state, indicatorOn: !state.indicatorOn };

    default:
      return state;
  }
}
