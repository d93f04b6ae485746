import type { FilterState } from '../state/filter-reducer';
import type { LogViewportState } from '../state/log-reducer';
import type { PickerMode, UnitAction } from '../types/domain';
import {
  ALL,
  actionLabel,
  actionShortcut,
  categoryLabel,
  FILE_STATE_OPTIONS,
  severityOptions,
  subStateOptions,
  TIME_RANGES,
  timeRangeLabel,
  UNIT_CATEGORIES,
} from '../utils/catalog';

/** The parts of the session a picker reads. */
export interface PickerContext {
  filters: FilterState;
  logs: LogViewportState;
  actionOptions: readonly UnitAction[];
}

/** What confirming a picker entry changes. */
export type PickerSelection =
  | { kind: 'sub-state'; value: string | null }
  | { kind: 'category'; value: FilterState['category'] }
  | { kind: 'severity'; value: number | null }
  | { kind: 'time-range'; value: LogViewportState['timeRange'] }
  | { kind: 'file-state'; value: string | null }
  | { kind: 'action'; value: UnitAction };

export const PICKER_TITLES: Record<PickerMode, string> = {
  'status-picker': 'Filter by status',
  'category-picker': 'Unit type',
  'severity-picker': 'Minimum severity',
  'time-range-picker': 'Time range',
  'file-state-picker': 'Filter by file state',
  'action-picker': 'Actions',
};

export function pickerOptions(mode: PickerMode, ctx: PickerContext): string[] {
  switch (mode) {
    case 'status-picker':
      return [...subStateOptions(ctx.filters.category)];
    case 'category-picker':
      return UNIT_CATEGORIES.map(categoryLabel);
    case 'severity-picker':
      return severityOptions();
    case 'time-range-picker':
      return TIME_RANGES.map(timeRangeLabel);
    case 'file-state-picker':
      return [...FILE_STATE_OPTIONS];
    case 'action-picker':
      return ctx.actionOptions.map((a) => `${actionLabel(a)} (${actionShortcut(a)})`);
  }
}

function indexOrFirst(options: readonly string[], value: string | null): number {
  if (value === null) return 0;
  return Math.max(0, options.indexOf(value));
}

/**
 * Cursor position when a picker opens: the entry matching current state,
 * or "All" when no filter is active.
 */
export function preselectIndex(mode: PickerMode, ctx: PickerContext): number {
  switch (mode) {
    case 'status-picker':
      return indexOrFirst(subStateOptions(ctx.filters.category), ctx.filters.subState);
    case 'category-picker':
      return Math.max(0, UNIT_CATEGORIES.indexOf(ctx.filters.category));
    case 'severity-picker':
      return ctx.logs.severity === null ? 0 : ctx.logs.severity + 1;
    case 'time-range-picker':
      return Math.max(0, TIME_RANGES.indexOf(ctx.logs.timeRange));
    case 'file-state-picker':
      return indexOrFirst(FILE_STATE_OPTIONS, ctx.filters.fileState);
    case 'action-picker':
      return 0;
  }
}

/** Cyclic cursor step over `count` options. */
export function stepCursor(cursor: number, delta: number, count: number): number {
  if (count <= 0) return 0;
  return (((cursor + delta) % count) + count) % count;
}

export function selectionAt(
  mode: PickerMode,
  cursor: number,
  ctx: PickerContext,
): PickerSelection | null {
  switch (mode) {
    case 'status-picker': {
      const option = subStateOptions(ctx.filters.category)[cursor];
      if (option === undefined) return null;
      return { kind: 'sub-state', value: option === ALL ? null : option };
    }
    case 'category-picker': {
      const category = UNIT_CATEGORIES[cursor];
      return category === undefined ? null : { kind: 'category', value: category };
    }
    case 'severity-picker':
      if (cursor < 0 || cursor > 8) return null;
      return { kind: 'severity', value: cursor === 0 ? null : cursor - 1 };
    case 'time-range-picker': {
      const range = TIME_RANGES[cursor];
      return range === undefined ? null : { kind: 'time-range', value: range };
    }
    case 'file-state-picker': {
      const option = FILE_STATE_OPTIONS[cursor];
      if (option === undefined) return null;
      return { kind: 'file-state', value: option === ALL ? null : option };
    }
    case 'action-picker': {
      const action = ctx.actionOptions[cursor];
      return action === undefined ? null : { kind: 'action', value: action };
    }
  }
}

/** Action bound to a shortcut letter in the action picker, if offered. */
export function actionForShortcut(
  options: readonly UnitAction[],
  input: string,
): UnitAction | null {
  return options.find((a) => actionShortcut(a) === input) ?? null;
}
