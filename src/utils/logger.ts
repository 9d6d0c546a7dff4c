/**
 * Console logging for both sides of the bridge.
 *
 * Each area gets its own scoped logger, so a line reads
 * `[AnalyticsBridge:host] ...` or `[AnalyticsBridge:guest] ...`. Debug
 * output is switched globally with `setDebugLogging`; warnings and errors
 * are always printed.
 */

export type LogScope = "guest" | "host" | "config" | "transport";

export interface Logger {
  /** Printed only while debug logging is on. */
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

let enabled = false;

/**
 * Enables or disables debug logging.
 * @param value If true, `log` calls are printed.
 */
export function setDebugLogging(value: boolean) {
  enabled = value;
}

export function isDebugLogging(): boolean {
  return enabled;
}

export function createLogger(scope: LogScope): Logger {
  const tag = `[AnalyticsBridge:${scope}]`;
  return {
    log: (...args) => {
      if (enabled) console.log(tag, ...args);
    },
    warn: (...args) => console.warn(tag, ...args),
    error: (...args) => console.error(tag, ...args),
  };
}
