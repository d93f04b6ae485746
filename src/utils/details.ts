import type { Unit, UnitProperties } from '../types/domain';
import { formatBytes, formatCpuTime } from './formatters';

export interface DetailLine {
  label: string;
  value: string;
  heading?: boolean;
}

const field = (label: string, value: string): DetailLine => ({ label, value });
const heading = (label: string): DetailLine => ({ label, value: '', heading: true });

function list(label: string, values: readonly string[]): DetailLine[] {
  return values.length === 0 ? [] : [field(label, values.join(' '))];
}

function optional(label: string, value: string): DetailLine[] {
  return value ? [field(label, value)] : [];
}

/**
 * Rows of the details modal. Sections appear only when the sheet has something for them.
 */
export function buildDetailLines(unit: Unit, props: UnitProperties | null): DetailLine[] {
  const lines: DetailLine[] = [
    field('Name', unit.name),
    field('Description', props?.description || unit.description),
    field('Load', props?.loadState || unit.loadState),
    field('Active', `${props?.activeState || unit.activeState} (${props?.subState || unit.subState})`),
  ];

  if (!props) {
    lines.push(field('', 'Loading properties…'));
    return lines;
  }

  lines.push(
    ...optional('Unit file', props.fragmentPath),
    ...optional('File state', props.unitFileState),
    ...optional('Since', props.activeEnterTimestamp),
    ...optional('Result', props.result),
  );

  const resources: DetailLine[] = [];
  if (props.mainPid > 0) resources.push(field('Main PID', String(props.mainPid)));
  if (props.execMainStartTimestamp) resources.push(field('Started', props.execMainStartTimestamp));
  if (props.memoryCurrent !== undefined) resources.push(field('Memory', formatBytes(props.memoryCurrent)));
  if (props.cpuUsageNsec !== undefined) resources.push(field('CPU', formatCpuTime(props.cpuUsageNsec)));
  if (resources.length > 0) lines.push(heading('Process'), ...resources);

  const timer: DetailLine[] = [
    ...list('Calendar', props.timersCalendar),
    ...list('Monotonic', props.timersMonotonic),
    ...optional('Next elapse', props.nextElapseRealtime),
    ...optional('Last trigger', props.lastTriggerUsec),
    ...optional('Persistent', props.persistent),
    ...optional('Accuracy', props.accuracyUsec),
    ...optional('Random delay', props.randomizedDelayUsec),
  ];
  if (timer.length > 0) lines.push(heading('Timer'), ...timer);

  const socket: DetailLine[] = [
    ...optional('Listen', props.listen),
    ...optional('Accept', props.accept),
    ...optional('Connections', props.nConnections),
    ...optional('Accepted', props.nAccepted),
    ...optional('Paths', props.paths),
  ];
  if (socket.length > 0) lines.push(heading('Activation'), ...socket);

  const deps: DetailLine[] = [
    ...list('Requires', props.requires),
    ...list('Wants', props.wants),
    ...list('After', props.after),
    ...list('Before', props.before),
    ...list('Conflicts', props.conflicts),
    ...list('Triggered by', props.triggeredBy),
    ...list('Triggers', props.triggers),
  ];
  if (deps.length > 0) lines.push(heading('Dependencies'), ...deps);

  return lines;
}

/** Zero-value sheet, used when a property query fails. */
export function emptyProperties(): UnitProperties {
  return {
    fragmentPath: '',
    unitFileState: '',
    activeState: '',
    activeEnterTimestamp: '',
    subState: '',
    loadState: '',
    description: '',
    mainPid: 0,
    execMainStartTimestamp: '',
    requires: [],
    wants: [],
    after: [],
    before: [],
    conflicts: [],
    triggeredBy: [],
    triggers: [],
    timersCalendar: [],
    timersMonotonic: [],
    lastTriggerUsec: '',
    result: '',
    nextElapseRealtime: '',
    persistent: '',
    accuracyUsec: '',
    randomizedDelayUsec: '',
    paths: '',
    listen: '',
    accept: '',
    nConnections: '',
    nAccepted: '',
  };
}
