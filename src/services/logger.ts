import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import pino from 'pino';
import { ResultAsync } from 'neverthrow';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const SESSION_PREFIX = 'sysdeck-session-';

interface LoggerConfig {
  sessionId: string;
  directory?: string;
  keepSessions?: number; // Number of old sessions to keep (default: 5)
}

class Logger {
  private pinoLogger: pino.Logger;
  private sessionId: string;
  private directory: string;
  private logFilePath: string;
  private keepSessions: number;

  constructor(config: LoggerConfig) {
    this.sessionId = config.sessionId;
    this.directory = config.directory ?? tmpdir();
    this.keepSessions = config.keepSessions ?? 5;
    this.logFilePath = join(this.directory, `${SESSION_PREFIX}${this.sessionId}.log`);

    this.pinoLogger = pino({
      level: 'debug',
      timestamp: pino.stdTimeFunctions.isoTime,
    }, pino.destination({
      dest: this.logFilePath,
      sync: false,
    }));
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.debug({ context, data }, message);
  }

  info(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.info({ context, data }, message);
  }

  warn(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.warn({ context, data }, message);
  }

  error(message: string, context?: string, data?: unknown): void {
    this.pinoLogger.error({ context, data }, message);
  }

  getSessionId(): string {
    return this.sessionId;
  }

  getLogFilePath(): string {
    return this.logFilePath;
  }

  // Clean up old session files, keeping only the most recent N sessions
  cleanupOldSessions(): ResultAsync<void, { message: string }> {
    return ResultAsync.fromPromise(fs.readdir(this.directory), () => ({
      message: 'Failed to read temp directory'
    }))
      .andThen(files => {
        const sessionFiles = files
          .filter(f => f.startsWith(SESSION_PREFIX) && f.endsWith('.log'))
          .map(f => ({ name: f, path: join(this.directory, f) }))
          .sort((a, b) => b.name.localeCompare(a.name)); // newest first, names carry the timestamp

        const filesToDelete = sessionFiles.slice(this.keepSessions);
        const deletions = filesToDelete.map(file =>
          ResultAsync.fromPromise(
            fs.unlink(file.path),
            () => ({ message: `Failed to delete old log file: ${file.name}` })
          )
        );

        return ResultAsync.combine(deletions).map(() => undefined);
      });
  }

  // Flush any pending writes
  close(): ResultAsync<void, { message: string }> {
    return ResultAsync.fromPromise(
      new Promise<void>((resolve, reject) => {
        this.pinoLogger.flush((error) => {
          if (error) reject(error);
          else resolve();
        });
      }),
      (error) => ({ message: error instanceof Error ? error.message : 'Failed to flush logger' })
    );
  }
}

// Singleton logger instance
let globalLogger: Logger | null = null;

export function sessionIdFor(date: Date): string {
  return date.toISOString().replace(/[:.]/g, '-').replace('T', '-').split('Z')[0];
}

// Initialize the global logger with a session ID based on current timestamp
export function initializeLogger(sessionId?: string): Logger {
  const logger = new Logger({ sessionId: sessionId || sessionIdFor(new Date()) });
  globalLogger = logger;

  // Clean up old sessions in the background
  void logger.cleanupOldSessions().match(
    () => {},
    (error) => logger.warn('Failed to cleanup old log sessions', 'logger', error.message),
  );

  return logger;
}

export function getLogger(): Logger | null {
  return globalLogger;
}

// Convenience functions for logging, no-ops until initialized
export const log = {
  debug: (message: string, context?: string, data?: unknown) => globalLogger?.debug(message, context, data),
  info: (message: string, context?: string, data?: unknown) => globalLogger?.info(message, context, data),
  warn: (message: string, context?: string, data?: unknown) => globalLogger?.warn(message, context, data),
  error: (message: string, context?: string, data?: unknown) => globalLogger?.error(message, context, data),
};

export { Logger };
