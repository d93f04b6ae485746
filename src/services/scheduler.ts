/** Timers the session loop waits on, as absolute times in ms. */
export interface LoopTimers {
  now: number;
  /** Null when live tail is off or nothing can be tailed. */
  tailDueAt: number | null;
  /** Null when no indicator is blinking. */
  blinkDueAt: number | null;
  actionPending: boolean;
}

export const ACTION_POLL_INTERVAL_MS = 100;
export const IDLE_WAIT_MS = 1000;

/**
 * How long the loop may sleep: until the earliest due timer, never negative.
 * With nothing due it idles; settled channels wake it early.
 */
export function nextWakeDelay(timers: LoopTimers): number {
  const candidates: number[] = [IDLE_WAIT_MS];
  if (timers.tailDueAt !== null) candidates.push(timers.tailDueAt - timers.now);
  if (timers.blinkDueAt !== null) candidates.push(timers.blinkDueAt - timers.now);
  if (timers.actionPending) candidates.push(ACTION_POLL_INTERVAL_MS);
  return Math.max(0, Math.min(...candidates));
}

export function isDue(dueAt: number | null, now: number): boolean {
  return dueAt !== null && now >= dueAt;
}
