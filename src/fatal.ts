// Fatal error handling: nothing is recovered, every failure ends the process

import { APP_NAME } from './config.js';
import { logger } from './logger.js';

export interface RestorableTerminal {
  leave(): void;
}

let activeSession: RestorableTerminal | undefined;

export function setActiveTerminal(session: RestorableTerminal | undefined): void {
  activeSession = session;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Log the error, restore the terminal when a session is active, report on stderr and exit with status 1.
 */
export function failFast(error: unknown): never {
  logger.fatal({ err: error }, 'Fatal error: %s', describeError(error));

  try {
    activeSession?.leave();
  } catch (restoreError) {
    logger.error('Failed to restore terminal: %s', describeError(restoreError));
  }
  activeSession = undefined;

  process.stderr.write(`${APP_NAME}: ${describeError(error)}\n`);
  process.exit(1);
}

export function installFatalHandlers(): void {
  process.on('uncaughtException', error => failFast(error));
  process.on('unhandledRejection', reason => failFast(reason));
}
