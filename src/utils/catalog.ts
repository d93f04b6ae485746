/**
 * Fixed option lists and the rules that depend on them.
 */
import type { TimeRange, UnitAction, UnitCategory } from '../types/domain';

export const ALL = 'All';

export const UNIT_CATEGORIES: readonly UnitCategory[] = [
  'service',
  'timer',
  'socket',
  'target',
  'path',
];

const CATEGORY_LABELS: Record<UnitCategory, string> = {
  service: 'Services',
  timer: 'Timers',
  socket: 'Sockets',
  target: 'Targets',
  path: 'Paths',
};

const SUB_STATE_OPTIONS: Record<UnitCategory, readonly string[]> = {
  service: [ALL, 'running', 'exited', 'failed', 'dead'],
  timer: [ALL, 'waiting', 'running', 'elapsed'],
  socket: [ALL, 'listening', 'running', 'failed'],
  target: [ALL, 'active', 'inactive'],
  path: [ALL, 'waiting', 'running', 'failed'],
};

export const FILE_STATE_OPTIONS: readonly string[] = [
  ALL,
  'enabled',
  'disabled',
  'static',
  'masked',
  'indirect',
];

export const SEVERITY_LABELS: readonly string[] = [
  'emerg',
  'alert',
  'crit',
  'err',
  'warning',
  'notice',
  'info',
  'debug',
];

export const TIME_RANGES: readonly TimeRange[] = ['all', '15m', '1h', '24h', '7d', 'today'];

const TIME_RANGE_LABELS: Record<TimeRange, string> = {
  all: 'All',
  '15m': 'Last 15 minutes',
  '1h': 'Last 1 hour',
  '24h': 'Last 24 hours',
  '7d': 'Last 7 days',
  today: 'Today',
};

const TIME_RANGE_SINCE: Record<TimeRange, string | null> = {
  all: null,
  '15m': '15 min ago',
  '1h': '1 hour ago',
  '24h': '1 day ago',
  '7d': '7 days ago',
  today: 'today',
};

type ActionInfo = {
  label: string;
  shortcut: string;
  progress: string;
};

const ACTIONS: Record<UnitAction, ActionInfo> = {
  start: { label: 'Start', shortcut: 's', progress: 'Starting...' },
  stop: { label: 'Stop', shortcut: 't', progress: 'Stopping...' },
  restart: { label: 'Restart', shortcut: 'r', progress: 'Restarting...' },
  reload: { label: 'Reload', shortcut: 'l', progress: 'Reloading...' },
  enable: { label: 'Enable', shortcut: 'e', progress: 'Enabling...' },
  disable: { label: 'Disable', shortcut: 'd', progress: 'Disabling...' },
  'daemon-reload': { label: 'Daemon Reload', shortcut: 'D', progress: 'Reloading daemon...' },
};

export function categoryLabel(category: UnitCategory): string {
  return CATEGORY_LABELS[category];
}

export function isUnitCategory(value: string): value is UnitCategory {
  return UNIT_CATEGORIES.some((category) => category === value);
}

export function subStateOptions(category: UnitCategory): readonly string[] {
  return SUB_STATE_OPTIONS[category];
}

export function severityLabel(severity: number): string {
  return SEVERITY_LABELS[severity] ?? 'unknown';
}

/** "All" followed by every severity, most severe first. */
export function severityOptions(): string[] {
  return [ALL, ...SEVERITY_LABELS.map((label, i) => `${i} ${label}`)];
}

export function timeRangeLabel(range: TimeRange): string {
  return TIME_RANGE_LABELS[range];
}

/** The `--since` expression for a range, or null when unbounded. */
export function timeRangeSince(range: TimeRange): string | null {
  return TIME_RANGE_SINCE[range];
}

export function actionLabel(action: UnitAction): string {
  return ACTIONS[action].label;
}

export function actionShortcut(action: UnitAction): string {
  return ACTIONS[action].shortcut;
}

export function actionProgressLabel(action: UnitAction): string {
  return ACTIONS[action].progress;
}

export function isHostWide(action: UnitAction): boolean {
  return action === 'daemon-reload';
}

export function confirmationMessage(action: UnitAction, unitName: string): string {
  if (isHostWide(action)) return 'Reload systemd daemon configuration?';
  return `${actionLabel(action)} ${unitName}?`;
}

export function availableActions(subState: string, fileState?: string): UnitAction[] {
  const actions: UnitAction[] = [];

  switch (subState) {
    case 'running':
    case 'active':
    case 'listening':
    case 'waiting':
      actions.push('stop', 'restart', 'reload');
      break;
    case 'dead':
    case 'failed':
    case 'inactive':
    case 'exited':
      actions.push('start');
      break;
    default:
      actions.push('start', 'stop');
  }

  if (fileState === 'enabled') actions.push('disable');
  else if (fileState === 'disabled') actions.push('enable');

  actions.push('daemon-reload');
  return actions;
}
