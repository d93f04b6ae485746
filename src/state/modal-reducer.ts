import type { UnitAction } from '../types/domain';

export interface UnitFileView {
  unitName: string;
  lines: string[] | null;
  error: string | null;
  scroll: number;
}

export interface ModalState {
  /** Cursor of whichever picker is open. */
  pickerCursor: number;
  /** Actions offered by the action picker, fixed when it opens. */
  actionOptions: UnitAction[];
  detailsUnit: string | null;
  detailScroll: number;
  unitFile: UnitFileView | null;
}

export type ModalAction =
  | { type: 'SET_PICKER_CURSOR'; payload: number }
  | { type: 'SET_ACTION_OPTIONS'; payload: UnitAction[] }
  | { type: 'SET_DETAILS_UNIT'; payload: string | null }
  | { type: 'SET_DETAIL_SCROLL'; payload: number }
  | { type: 'SET_UNIT_FILE'; payload: UnitFileView | null }
  | { type: 'UNIT_FILE_LOADED'; payload: { unitName: string; lines: string[] } }
  | { type: 'UNIT_FILE_FAILED'; payload: { unitName: string; message: string } }
  | { type: 'SET_UNIT_FILE_SCROLL'; payload: number };

export const initialModalState: ModalState = {
  pickerCursor: 0,
  actionOptions: [],
  detailsUnit: null,
  detailScroll: 0,
  unitFile: null,
};

/**
 * Pure reducer for overlay-local state
 * Which overlay is open is the top-level mode; this holds what each one needs.
 */
export function modalReducer(state: ModalState, action: ModalAction): ModalState {
  switch (action.type) {
    case 'SET_PICKER_CURSOR':
      return { ...state, pickerCursor: action.payload };

    case 'SET_ACTION_OPTIONS':
      return { ...state, actionOptions: action.payload };

    case 'SET_DETAILS_UNIT':
      return { ...state, detailsUnit: action.payload, detailScroll: 0 };

    case 'SET_DETAIL_SCROLL':
      return { ...state, detailScroll: Math.max(0, action.payload) };

    case 'SET_UNIT_FILE':
      return { ...state, unitFile: action.payload };

    case 'UNIT_FILE_LOADED':
      if (state.unitFile?.unitName !== action.payload.unitName) return state;
      return {
        ...state,
        unitFile: { ...state.unitFile, lines: action.payload.lines, error: null },
      };

    case 'UNIT_FILE_FAILED':
      if (state.unitFile?.unitName !== action.payload.unitName) return state;
      return {
        ...state,
        unitFile: { ...state.unitFile, lines: null, error: action.payload.message },
      };

    case 'SET_UNIT_FILE_SCROLL':
      if (!state.unitFile) return state;
      return { ...state, unitFile: { ...state.unitFile, scroll: Math.max(0, action.payload) } };

    default:
      return state;
  }
}
