import { log } from "./logger";

export interface StatusLogger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  set(message: string): void;
  clear(): void;
}

export type StatusChangeHandler = (status: string) => void;

/**
 * Status bar messages paired with session log entries.
 * React-free; the session loop wires the handler to dispatch.
 */
export class StatusService implements StatusLogger {
  private statusChangeHandler?: StatusChangeHandler;
  private readonly context: string;

  constructor(statusChangeHandler?: StatusChangeHandler, context = "status") {
    this.statusChangeHandler = statusChangeHandler;
    this.context = context;
  }

  /**
   * Same status bar, different log context
   */
  scoped(context: string): StatusService {
    const scoped = new StatusService(undefined, context);
    scoped.statusChangeHandler = (status) => this.setStatus(status);
    return scoped;
  }

  info(message: string, data?: unknown): void {
    this.setStatus(message);
    log.info(message, this.context, data);
  }

  warn(message: string, data?: unknown): void {
    this.setStatus(message);
    log.warn(message, this.context, data);
  }

  error(message: string, data?: unknown): void {
    this.setStatus(message);
    log.error(message, this.context, data);
  }

  // Debug goes to the session log only
  debug(message: string, data?: unknown): void {
    log.debug(message, this.context, data);
  }

  set(message: string): void {
    this.setStatus(message);
  }

  clear(): void {
    this.setStatus("");
  }

  setStatusChangeHandler(handler: StatusChangeHandler): void {
    this.statusChangeHandler = handler;
  }

  clearStatusChangeHandler(): void {
    this.statusChangeHandler = undefined;
  }

  private setStatus(message: string): void {
    this.statusChangeHandler?.(message);
  }
}

export function createStatusService(
  handler: StatusChangeHandler,
  context?: string,
): StatusService {
  return new StatusService(handler, context);
}

/** No-op status service for tests */
export function createNoOpStatusService(): StatusService {
  return new StatusService();
}
