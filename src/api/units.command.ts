import type { Scope, UnitAction } from '../types/domain';
import type { ActionOutcome } from '../types/sources';
import { actionLabel, isHostWide } from '../utils/catalog';
import { type CommandOutput, runCommand, type SystemdBinaries } from './exec';
import { scopeArgs } from './units.query';

export function actionArgs(action: UnitAction, name: string, scope: Scope): string[] {
  const args = [...scopeArgs(scope), action];
  if (!isHostWide(action)) args.push(name);
  return args;
}

/** Outcome message for a finished run; host-wide actions name no unit. */
export function actionOutcome(action: UnitAction, name: string, out: CommandOutput): ActionOutcome {
  const label = actionLabel(action);
  if (out.exitCode !== 0) return { ok: false, message: `${label} failed: ${out.stderr.trim()}` };
  return {
    ok: true,
    message: isHostWide(action) ? `${label} succeeded` : `${label} succeeded for ${name}`,
  };
}

/**
 * Run a lifecycle action. Resolves with the outcome either way; the
 * message is what the confirm dialog shows.
 */
export function runAction(
  bin: SystemdBinaries,
  action: UnitAction,
  name: string,
  scope: Scope,
): Promise<ActionOutcome> {
  return runCommand(bin.systemctl, actionArgs(action, name, scope), {
    timeoutMs: bin.actionTimeoutMs,
  }).match(
    (out) => actionOutcome(action, name, out),
    (error): ActionOutcome => ({ ok: false, message: `${actionLabel(action)} failed: ${error.message}` }),
  );
}
