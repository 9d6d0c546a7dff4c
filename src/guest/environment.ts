/**
 * The slice of the browser the guest bindings touch. Passing it explicitly
 * keeps the URL watcher's patching confined to one object.
 */
export interface NavigationEnvironment {
  history: Pick<History, "pushState">;
  location: Pick<Location, "href" | "pathname">;
  document: Pick<Document, "title">;
}

/** Builds the environment from the window globals. */
export function browserEnvironment(): NavigationEnvironment {
  if (typeof window === "undefined" || typeof document === "undefined") {
    throw new Error(
      "No browser window available. Pass an `environment` to createGuestAnalytics()."
    );
  }
  return {
    history: window.history,
    location: window.location,
    document,
  };
}
