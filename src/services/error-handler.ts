import type { ErrorInfo } from "react";
import { getLogger, log } from "./logger";

export function logReactError(error: Error, errorInfo: ErrorInfo): void {
  log.error(`React render error: ${error.message}`, "react", {
    stack: error.stack,
    componentStack: errorInfo.componentStack,
  });
}

/**
 * Log process-level failures before exiting. `restore` puts the terminal
 * back (alternate screen, cursor) so the message stays readable.
 */
export function setupGlobalErrorHandlers(restore: () => void): void {
  const fail = (kind: string, reason: unknown) => {
    const message = reason instanceof Error ? reason.message : String(reason);
    log.error(`${kind}: ${message}`, "process", reason instanceof Error ? reason.stack : undefined);
    restore();
    const path = getLogger()?.getLogFilePath();
    process.stderr.write(`sysdeck crashed: ${message}\n${path ? `Session log: ${path}\n` : ""}`);
    process.exit(1);
  };

  process.on("uncaughtException", (error) => fail("Uncaught exception", error));
  process.on("unhandledRejection", (reason) => fail("Unhandled rejection", reason));
}
