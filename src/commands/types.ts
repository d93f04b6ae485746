import type { Key } from "ink";
import type { Dispatch } from "react";
import type { AppAction, AppState } from "../contexts/AppStateContext";
import type { StatusLogger } from "../services/status-service";

/** The parts of the session loop a key handler may drive directly. */
export interface SessionControl {
  executePending(): void;
  dismissPending(): void;
}

export interface CommandContext {
  state: AppState;
  dispatch: Dispatch<AppAction>;
  statusLog: StatusLogger;
  session: SessionControl;
  cleanupAndExit: () => void;
}

export interface InputHandler {
  /** Higher runs first; defaults to 0. */
  priority?: number;
  canHandle(context: CommandContext): boolean;
  /** Returns true when the key was consumed. */
  handleInput(input: string, key: Key, context: CommandContext): boolean;
}
