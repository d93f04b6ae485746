import stringWidth from 'string-width';
import type { LogRecord } from '../types/domain';
import { formatLogLine } from '../utils/formatters';

/** Why a marker line separates two adjacent records. */
export type Discontinuity = 'reboot' | 'restart';

/** Last known identifiers seen in the stream, carried across appends. */
export interface ContinuityState {
  bootId?: string;
  invocationId?: string;
}

export type ScrollAnchor = { kind: 'track-latest' } | { kind: 'fixed'; index: number };

export type HeightAt = (index: number) => number;

/**
 * Markers aligned with `records`: `markers[i]` is rendered between record i-1 and i.
 *
 * A boot id change wins over an invocation id change at the same boundary.
 * Both are compared with the last known non-empty value, so records without
 * ids neither trigger nor reset a marker.
 */
export function detectDiscontinuities(
  records: readonly LogRecord[],
  prior: ContinuityState = {},
): { markers: (Discontinuity | null)[]; state: ContinuityState } {
  const markers: (Discontinuity | null)[] = [];
  let { bootId, invocationId } = prior;

  for (const record of records) {
    let marker: Discontinuity | null = null;

    if (record.bootId) {
      if (bootId !== undefined && record.bootId !== bootId) {
        marker = 'reboot';
        // invocation ids from the previous boot mean nothing now
        invocationId = undefined;
      }
      bootId = record.bootId;
    }

    if (record.invocationId) {
      if (marker === null && invocationId !== undefined && record.invocationId !== invocationId) {
        marker = 'restart';
      }
      invocationId = record.invocationId;
    }

    markers.push(marker);
  }

  return { markers, state: { bootId, invocationId } };
}

export function markerText(marker: Discontinuity): string {
  return marker === 'reboot' ? '-- Reboot --' : '-- Restarted --';
}

/** Split a line into chunks of at most `width` columns, breaking anywhere. */
export function hardWrap(text: string, width: number): string[] {
  if (width <= 0 || text.length === 0) return [text];
  const lines: string[] = [];
  let line = '';
  let used = 0;
  for (const ch of text) {
    const w = stringWidth(ch);
    if (used + w > width && line) {
      lines.push(line);
      line = '';
      used = 0;
    }
    line += ch;
    used += w;
  }
  lines.push(line);
  return lines;
}

/** Number of terminal rows a line occupies when wrapped at `width` columns. */
export function wrappedHeight(text: string, width: number): number {
  return hardWrap(text, width).length;
}

/** Rows taken by one record, its marker line included. */
export function recordHeight(
  record: LogRecord,
  marker: Discontinuity | null | undefined,
  width: number,
): number {
  return wrappedHeight(formatLogLine(record), width) + (marker ? 1 : 0);
}

/**
 * Smallest index whose records up to the end fit in `viewportHeight` rows,
 * scanning backward from the newest record only as far as needed.
 * When the newest record alone is taller than the viewport, that record's index.
 */
export function resolveBottomIndex(
  count: number,
  heightAt: HeightAt,
  viewportHeight: number,
): number {
  if (count === 0) return 0;

  let used = 0;
  let i = count;
  while (i > 0) {
    const h = heightAt(i - 1);
    if (used + h > viewportHeight) break;
    used += h;
    i--;
  }

  return i === count ? count - 1 : i;
}

/** Index of the first record drawn for an anchor. */
export function resolveTopIndex(
  anchor: ScrollAnchor,
  count: number,
  heightAt: HeightAt,
  viewportHeight: number,
): number {
  const bottom = resolveBottomIndex(count, heightAt, viewportHeight);
  if (anchor.kind === 'track-latest') return bottom;
  return Math.max(0, Math.min(anchor.index, bottom));
}

/** Exclusive end index of the records that fit below `top`; always shows at least one. */
export function visibleEnd(
  top: number,
  count: number,
  heightAt: HeightAt,
  viewportHeight: number,
): number {
  let used = 0;
  let i = top;
  while (i < count) {
    const h = heightAt(i);
    if (i > top && used + h > viewportHeight) break;
    used += h;
    i++;
  }
  return i;
}

/** Indices of records whose message contains `query`, case-insensitively. */
export function findMatches(records: readonly LogRecord[], query: string, offset = 0): number[] {
  if (!query) return [];
  const q = query.toLowerCase();
  const matches: number[] = [];
  records.forEach((record, i) => {
    if (record.message.toLowerCase().includes(q)) matches.push(offset + i);
  });
  return matches;
}
