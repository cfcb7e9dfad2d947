/**
 * Logging helpers.
 * The daemon prefixes console output with timestamps; library code logs
 * through scoped loggers so messages carry a "[Scope]" tag.
 */

/**
 * Format a timestamp in ISO 8601 format with timezone.
 * Example: 2026-01-03T16:45:23.123Z
 */
function formatTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Install timestamp logging by overriding console methods.
 * All subsequent console.log/error/warn calls will be prefixed with timestamps.
 */
export function installTimestampLogging(): void {
  const originalLog = console.log;
  const originalError = console.error;
  const originalWarn = console.warn;

  console.log = (...args: unknown[]) => {
    originalLog(`[${formatTimestamp()}]`, ...args);
  };

  console.error = (...args: unknown[]) => {
    originalError(`[${formatTimestamp()}]`, ...args);
  };

  console.warn = (...args: unknown[]) => {
    originalWarn(`[${formatTimestamp()}]`, ...args);
  };
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isDebugEnabled(): boolean {
  return process.env["SB_DEBUG"] === "1";
}

/**
 * Create a logger whose messages are tagged with the given scope.
 * Debug output only appears when SB_DEBUG=1.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug(message, ...args) {
      if (isDebugEnabled()) {
        console.error(tag, message, ...args);
      }
    },
    info(message, ...args) {
      console.log(tag, message, ...args);
    },
    warn(message, ...args) {
      console.warn(tag, message, ...args);
    },
    error(message, ...args) {
      console.error(tag, message, ...args);
    },
  };
}

/** Logger that drops everything, for embedding the engine under a TUI */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/** Render an unknown thrown value as a short message */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
