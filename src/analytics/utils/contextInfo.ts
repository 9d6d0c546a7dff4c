import os from "node:os";
import pkg from "../../../package.json";
import type { EventContext } from "../types";

let cachedContext: EventContext | null = null;

/**
 * Returns the current IANA time zone, or 'UTC' if it cannot be resolved.
 */
export function getTimeZone(): string {
  try {
    return Intl.DateTimeFormat().resolvedOptions().timeZone || "UTC";
  } catch {
    return "UTC";
  }
}

function getLocale(): string {
  try {
    return Intl.DateTimeFormat().resolvedOptions().locale || "en-US";
  } catch {
    return "en-US";
  }
}

/**
 * Gathers the host context attached to every message: library, OS, locale,
 * time zone and, when configured, the app. The host part is cached for the
 * process lifetime.
 */
export function getContextInfo(app?: EventContext["app"]): EventContext {
  if (!cachedContext) {
    cachedContext = {
      library: {
        name: pkg.name,
        version: pkg.version ?? "0.0.0",
      },
      os: {
        name: os.type(),
        version: os.release(),
      },
      locale: getLocale(),
      timezone: getTimeZone(),
    };
  }

  return app ? { ...cachedContext, app: { ...app } } : cachedContext;
}

export function clearContextCache() {
  cachedContext = null;
}
