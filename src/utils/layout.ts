import type { LayoutState } from '../contexts/AppStateContext';
import type { Mode } from '../types/domain';

export const HEADER_LINES = 1;
export const STATUS_LINES = 1;
const BORDER_LINES = 2;
const MIN_BOX = BORDER_LINES + 2;

export interface PaneHeights {
  unitBox: number;
  logBox: number;
}

/**
 * Split the terminal between the unit list and the log panel, and derive the
 * visible line counts the engines need. Overlays take the log panel's place.
 */
export function computeLayout(
  rows: number,
  cols: number,
  mode: Mode,
): { panes: PaneHeights; layout: LayoutState } {
  const searchLines = mode === 'search' || mode === 'log-search' ? 1 : 0;
  // Ink leaves the last terminal row for the cursor
  const available = Math.max(0, rows - 1 - HEADER_LINES - STATUS_LINES - searchLines);
  const unitBox = Math.max(MIN_BOX, Math.floor(available * 0.4));
  const logBox = Math.max(MIN_BOX, available - unitBox);

  return {
    panes: { unitBox, logBox },
    layout: {
      unitRows: Math.max(1, unitBox - BORDER_LINES - 1),
      logRows: Math.max(1, logBox - BORDER_LINES - 1),
      // outer padding, border and inner padding on both sides
      logCols: Math.max(10, cols - 6),
      detailRows: Math.max(1, logBox - BORDER_LINES - 2),
    },
  };
}

/** First row to draw so that `selected` stays on screen, roughly centred. */
export function listWindowStart(selected: number | null, total: number, rows: number): number {
  if (selected === null || total <= rows) return 0;
  return Math.max(0, Math.min(selected - Math.floor(rows / 2), total - rows));
}
