// ============================================================================
// LOGGING - Tagged console output, debug lines off unless switched on
// ============================================================================

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

let debugEnabled = false;

/** Level.build applies CollapseConfig.debugLogging through this */
export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message, ...details) => {
      if (debugEnabled) console.debug(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => console.warn(`${prefix} ${message}`, ...details),
  };
}
