/**
 * Console-backed logger used when the host does not inject one.
 */

import type { AuditLogger } from "./types.js";

export function createConsoleLogger(options?: { verbose?: boolean }): AuditLogger {
  const logger: AuditLogger = {
    info: (message) => console.log(message),
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
  };
  if (options?.verbose) {
    logger.debug = (message) => console.debug(message);
  }
  return logger;
}

/** Logger that drops everything. Handy for tests and library embedding. */
export const silentLogger: AuditLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
