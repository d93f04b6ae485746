// Domain types used across the app (stable)

export type UnitCategory = 'service' | 'timer' | 'socket' | 'target' | 'path';
export type Scope = 'system' | 'user';

/** One row of the unit inventory. Replaced wholesale on every refresh. */
export type Unit = {
  readonly name: string;
  readonly subState: string;
  readonly activeState: string;
  readonly loadState: string;
  readonly description: string;
  readonly detail?: string;     // next elapse for timers, listen address for sockets
  readonly fileState?: string;  // enabled, disabled, static, masked, ...
};

export type UnitProperties = {
  fragmentPath: string;
  unitFileState: string;
  activeState: string;
  activeEnterTimestamp: string;
  subState: string;
  loadState: string;
  description: string;
  mainPid: number;
  execMainStartTimestamp: string;
  memoryCurrent?: number;
  cpuUsageNsec?: number;
  requires: string[];
  wants: string[];
  after: string[];
  before: string[];
  conflicts: string[];
  triggeredBy: string[];
  triggers: string[];
  timersCalendar: string[];
  timersMonotonic: string[];
  lastTriggerUsec: string;
  result: string;
  nextElapseRealtime: string;
  persistent: string;
  accuracyUsec: string;
  randomizedDelayUsec: string;
  paths: string;
  listen: string;
  accept: string;
  nConnections: string;
  nAccepted: string;
};

export type LogRecord = {
  timestamp?: number;     // microseconds since the epoch
  severity?: number;      // 0 (emerg) .. 7 (debug)
  pid?: string;
  identifier?: string;
  message: string;
  bootId?: string;
  invocationId?: string;
  cursor?: string;
};

export type TimeRange = 'all' | '15m' | '1h' | '24h' | '7d' | 'today';

export type UnitAction =
  | 'start'
  | 'stop'
  | 'restart'
  | 'reload'
  | 'enable'
  | 'disable'
  | 'daemon-reload';

export type Focus = 'units' | 'logs';

export type PickerMode =
  | 'status-picker'
  | 'category-picker'
  | 'severity-picker'
  | 'time-range-picker'
  | 'file-state-picker'
  | 'action-picker';

export type Mode =
  | 'normal'
  | 'search'
  | 'log-search'
  | PickerMode
  | 'confirm'
  | 'details'
  | 'unit-file'
  | 'help';
