/**
 * Pure formatting utility functions
 */
import type { LogRecord } from '../types/domain';

export type TextColor = {
  color?: string;
  dimColor?: boolean;
};

/**
 * Get color styling for a unit sub-state
 */
export function colorFor(subState: string): TextColor {
  switch ((subState || '').toLowerCase()) {
    case 'running':
    case 'listening':
    case 'active':
      return { color: 'green' };
    case 'exited':
    case 'elapsed':
      return { color: 'yellow' };
    case 'dead':
    case 'stopped':
    case 'inactive':
      return { dimColor: true };
    case 'failed':
      return { color: 'red' };
    case 'waiting':
      return { color: 'cyan' };
    default:
      return {};
  }
}

/**
 * Get color styling for a journal severity
 */
export function colorForSeverity(severity?: number): TextColor {
  if (severity === undefined) return {};
  if (severity <= 3) return { color: 'red' };
  if (severity === 4) return { color: 'yellow' };
  if (severity === 7) return { dimColor: true };
  return {};
}

/**
 * Time until a future instant, e.g. "2d 3h", "4m 10s"; "elapsed" once past
 */
export function formatRelativeTime(targetUs: number, nowUs: number = Date.now() * 1000): string {
  if (targetUs <= nowUs) return 'elapsed';

  const diff = Math.floor((targetUs - nowUs) / 1_000_000);
  const days = Math.floor(diff / 86400);
  const hours = Math.floor((diff % 86400) / 3600);
  const minutes = Math.floor((diff % 3600) / 60);
  const seconds = diff % 60;

  if (days > 0) return `${days}d ${hours}h`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const pad2 = (n: number) => String(n).padStart(2, '0');

/**
 * Journal timestamp (microseconds) in local time, "Jan 05 09:03:07"
 */
export function formatLogTimestamp(timestampUs: number): string {
  const d = new Date(Math.floor(timestampUs / 1000));
  if (!Number.isFinite(d.getTime())) return '';
  return `${MONTHS[d.getMonth()]} ${pad2(d.getDate())} ${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

/**
 * One journal record as a single line of text, before wrapping
 */
export function formatLogLine(record: LogRecord): string {
  const parts: string[] = [];
  if (record.timestamp !== undefined) {
    const ts = formatLogTimestamp(record.timestamp);
    if (ts) parts.push(ts);
  }
  if (record.identifier) {
    parts.push(record.pid ? `${record.identifier}[${record.pid}]:` : `${record.identifier}:`);
  }
  parts.push(record.message.replace(/[\r\n]+/g, ' ').replace(/\t/g, ' '));
  return parts.join(' ');
}

/**
 * Convert multiline text to single line
 */
export function singleLine(input?: string): string {
  const s = String(input || '');
  return s
    .replace(/[\r\n\t]+/g, ' ')
    .replace(/\s{2,}/g, ' ')
    .trim();
}

/**
 * Format a byte count, "1.5 MB"
 */
export function formatBytes(bytes: number): string {
  const KB = 1024;
  const MB = KB * 1024;
  const GB = MB * 1024;
  if (bytes >= GB) return `${(bytes / GB).toFixed(1)} GB`;
  if (bytes >= MB) return `${(bytes / MB).toFixed(1)} MB`;
  if (bytes >= KB) return `${(bytes / KB).toFixed(1)} KB`;
  return `${bytes} B`;
}

/**
 * Format CPU time given in nanoseconds
 */
export function formatCpuTime(nsec: number): string {
  const secs = nsec / 1_000_000_000;
  if (secs >= 60) return `${(secs / 60).toFixed(1)}min`;
  return `${secs.toFixed(3)}s`;
}

/**
 * Truncate text to maximum length with ellipsis
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  if (maxLength <= 3) return text.slice(0, maxLength);
  return `${text.slice(0, maxLength - 3)}...`;
}
