import type { UnitAction } from '../types/domain';
import type { ActionOutcome } from '../types/sources';

/**
 * Lifecycle of the one pending action:
 * idle -> confirming -> executing -> settled -> idle
 *
 * `unitName` is "" for host-wide actions.
 */
export type PendingActionState =
  | { phase: 'idle' }
  | { phase: 'confirming'; action: UnitAction; unitName: string }
  | { phase: 'executing'; action: UnitAction; unitName: string; invocation: number }
  | {
      phase: 'settled';
      action: UnitAction;
      unitName: string;
      invocation: number;
      outcome: ActionOutcome;
    };

export type PendingActionAction =
  | { type: 'ACTION_CONFIRMING'; payload: { action: UnitAction; unitName: string } }
  | { type: 'ACTION_EXECUTING'; payload: { invocation: number } }
  | { type: 'ACTION_SETTLED'; payload: { invocation: number; outcome: ActionOutcome } }
  | { type: 'ACTION_DISMISSED' };

export const initialPendingActionState: PendingActionState = { phase: 'idle' };

export function isActionInFlight(state: PendingActionState): boolean {
  return state.phase === 'executing';
}

/**
 * Pure reducer for the pending action
 * Transitions out of order are ignored, so a result delivered for a
 * dismissed or superseded invocation never resurfaces.
 */
export function pendingActionReducer(
  state: PendingActionState,
  action: PendingActionAction,
): PendingActionState {
  switch (action.type) {
    case 'ACTION_CONFIRMING':
      if (state.phase !== 'idle') return state;
      return { phase: 'confirming', ...action.payload };

    case 'ACTION_EXECUTING':
      if (state.phase !== 'confirming') return state;
      return {
        phase: 'executing',
        action: state.action,
        unitName: state.unitName,
        invocation: action.payload.invocation,
      };

    case 'ACTION_SETTLED':
      if (state.phase !== 'executing' || state.invocation !== action.payload.invocation) {
        return state;
      }
      return { ...state, phase: 'settled', outcome: action.payload.outcome };

    case 'ACTION_DISMISSED':
      return initialPendingActionState;

    default:
      return state;
  }
}
