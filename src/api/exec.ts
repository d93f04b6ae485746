import { execa } from 'execa';
import { errAsync, okAsync, ResultAsync } from 'neverthrow';
import type { SourceError } from '../types/sources';

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  timeoutMs?: number;
}

const describe = (e: unknown) => (e instanceof Error ? e.message : String(e));

/**
 * Run a binary with an argument array, never through a shell.
 * A non-zero exit is still Ok here; callers decide what it means.
 */
export function runCommand(
  file: string,
  args: readonly string[],
  options: RunOptions = {},
): ResultAsync<CommandOutput, SourceError> {
  return ResultAsync.fromPromise(
    execa(file, args, { reject: false, stdin: 'ignore', timeout: options.timeoutMs }),
    (e): SourceError => ({ kind: 'spawn', message: `Failed to execute ${file}: ${describe(e)}` }),
  ).andThen((result) => {
    if (result.timedOut) {
      return errAsync<CommandOutput, SourceError>({
        kind: 'timeout',
        message: `${file} timed out after ${options.timeoutMs ?? 0}ms`,
      });
    }
    if (result.exitCode === undefined) {
      return errAsync<CommandOutput, SourceError>({
        kind: 'spawn',
        message: `Failed to execute ${file}`,
      });
    }
    return okAsync<CommandOutput, SourceError>({
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.exitCode,
    });
  });
}

/** Stdout of a run that must exit 0; otherwise an exit error carrying stderr. */
export function runChecked(
  file: string,
  args: readonly string[],
  options: RunOptions = {},
): ResultAsync<string, SourceError> {
  return runCommand(file, args, options).andThen((out) =>
    out.exitCode === 0
      ? okAsync<string, SourceError>(out.stdout)
      : errAsync<string, SourceError>({
          kind: 'exit',
          message: `${file} failed: ${out.stderr.trim() || `exit code ${out.exitCode}`}`,
        }),
  );
}

/** Where the service-manager and journal binaries live, and how long actions may run. */
export interface SystemdBinaries {
  systemctl: string;
  journalctl: string;
  actionTimeoutMs: number;
}
