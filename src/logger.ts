export interface Logger {
  debug(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
}

let debugEnabled = false

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled
}

/**
 * Console logger that prefixes every line with `[scope]`.
 * Debug lines are dropped unless debug logging is on.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`
  return {
    debug(message, ...details) {
      if (debugEnabled) console.debug(prefix, message, ...details)
    },
    warn(message, ...details) {
      console.warn(prefix, message, ...details)
    },
  }
}
