import type { z } from 'zod';
import type { LogRecord, Unit, UnitProperties } from '../types/domain';
import { formatRelativeTime } from '../utils/formatters';
import {
  journalObjectSchema,
  type ListedUnit,
  type SocketEntry,
  type TimerEntry,
  type UnitFileEntry,
} from './schemas';

/** Parse JSON and validate it; null when either step fails. */
export function parseJsonAs<T>(text: string, schema: z.ZodType<T>): T | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function toUnit(listed: ListedUnit): Unit {
  return {
    name: listed.unit,
    loadState: listed.load,
    activeState: listed.active,
    subState: listed.sub,
    description: listed.description,
  };
}

const stringField = (value: unknown): string | undefined =>
  typeof value === 'string' ? value : undefined;

function integerField(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number(value);
  return undefined;
}

function decodeMessage(value: unknown, line: string): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const bytes = value.filter((b): b is number => typeof b === 'number' && b >= 0 && b <= 255);
    return Buffer.from(bytes).toString('utf8');
  }
  return line;
}

/**
 * One line of `journalctl --output=json`.
 * Anything that is not a JSON object is kept as a raw-text record.
 */
export function parseJournalLine(line: string): LogRecord {
  const entry = parseJsonAs(line, journalObjectSchema);
  if (!entry) return { message: line };

  return {
    message: decodeMessage(entry.MESSAGE, line),
    severity: integerField(entry.PRIORITY),
    timestamp: integerField(entry.__REALTIME_TIMESTAMP),
    pid: stringField(entry._PID),
    identifier: stringField(entry.SYSLOG_IDENTIFIER),
    bootId: stringField(entry._BOOT_ID),
    invocationId: stringField(entry._SYSTEMD_INVOCATION_ID),
    cursor: stringField(entry.__CURSOR),
  };
}

export function parseJournalOutput(stdout: string): LogRecord[] {
  return stdout
    .split('\n')
    .filter((line) => line.length > 0)
    .map(parseJournalLine);
}

/**
 * `{ OnCalendar=daily ; next_elapse=... }` groups reduced to the expression before the first `;`
 */
export function parseTimerSpecs(raw: string): string[] {
  if (!raw) return [];
  return raw
    .split('}')
    .map((chunk) => chunk.trim().replace(/^\{+/, '').trim())
    .map((chunk) => chunk.split(';')[0].trim())
    .filter((expr) => expr.length > 0);
}

function optionalCounter(value: string | undefined): number | undefined {
  if (!value || value === '[not set]' || value === 'infinity') return undefined;
  return /^\d+$/.test(value) ? Number(value) : undefined;
}

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(/\s+/).filter(Boolean);
}

/** `systemctl show` output, `KEY=VALUE` per line, split on the first `=`. */
export function parseShowOutput(stdout: string): UnitProperties {
  const map = new Map<string, string>();
  for (const line of stdout.split('\n')) {
    const eq = line.indexOf('=');
    if (eq > 0) map.set(line.slice(0, eq), line.slice(eq + 1));
  }
  const get = (key: string) => map.get(key) ?? '';
  const mainPid = Number.parseInt(get('MainPID') || '0', 10);

  return {
    fragmentPath: get('FragmentPath'),
    unitFileState: get('UnitFileState'),
    activeState: get('ActiveState'),
    activeEnterTimestamp: get('ActiveEnterTimestamp'),
    subState: get('SubState'),
    loadState: get('LoadState'),
    description: get('Description'),
    mainPid: Number.isNaN(mainPid) ? 0 : mainPid,
    execMainStartTimestamp: get('ExecMainStartTimestamp'),
    memoryCurrent: optionalCounter(map.get('MemoryCurrent')),
    cpuUsageNsec: optionalCounter(map.get('CPUUsageNSec')),
    requires: splitList(map.get('Requires')),
    wants: splitList(map.get('Wants')),
    after: splitList(map.get('After')),
    before: splitList(map.get('Before')),
    conflicts: splitList(map.get('Conflicts')),
    triggeredBy: splitList(map.get('TriggeredBy')),
    triggers: splitList(map.get('Triggers')),
    timersCalendar: parseTimerSpecs(get('TimersCalendar')),
    timersMonotonic: parseTimerSpecs(get('TimersMonotonic')),
    lastTriggerUsec: get('LastTriggerUSec'),
    result: get('Result'),
    nextElapseRealtime: get('NextElapseUSecRealtime'),
    persistent: get('Persistent'),
    accuracyUsec: get('AccuracyUSec'),
    randomizedDelayUsec: get('RandomizedDelayUSec'),
    paths: get('Paths'),
    listen: get('Listen'),
    accept: get('Accept'),
    nConnections: get('NConnections'),
    nAccepted: get('NAccepted'),
  };
}

export function mergeTimerDetails(
  units: readonly Unit[],
  timers: readonly TimerEntry[],
  nowUs: number = Date.now() * 1000,
): Unit[] {
  const byUnit = new Map(timers.map((t) => [t.unit, t] as const));
  return units.map((unit) => {
    const timer = byUnit.get(unit.name);
    if (!timer) return unit;
    const next = timer.next ?? 0;
    const detail = next === 0 ? 'next: n/a' : `next: ${formatRelativeTime(next, nowUs)}`;
    return { ...unit, detail };
  });
}

export function mergeSocketDetails(units: readonly Unit[], sockets: readonly SocketEntry[]): Unit[] {
  const byUnit = new Map(sockets.map((s) => [s.unit, s.listen] as const));
  return units.map((unit) => {
    const listen = byUnit.get(unit.name);
    return listen === undefined ? unit : { ...unit, detail: listen };
  });
}

/** Unit files are listed by path; match on the file name. */
export function mergeFileStates(units: readonly Unit[], files: readonly UnitFileEntry[]): Unit[] {
  const byName = new Map(
    files.map((f) => [f.unit_file.slice(f.unit_file.lastIndexOf('/') + 1), f.state] as const),
  );
  return units.map((unit) => {
    const fileState = byName.get(unit.name);
    return fileState === undefined ? unit : { ...unit, fileState };
  });
}
