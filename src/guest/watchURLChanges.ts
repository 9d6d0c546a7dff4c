import type { Page } from "../contract/events";
import { createLogger } from "../utils/logger";
import type { NavigationEnvironment } from "./environment";
import { getPageProperties } from "./pageContext";

const logger = createLogger("guest");

export type StopWatching = () => void;

/**
 * Wraps `env.history.pushState` so that every in-app navigation also emits a
 * Page event named after the new path, with `{ title, url }` as properties.
 *
 * - The original `pushState` runs first, unchanged, and its result is returned.
 * - A failed Page send is logged and never reaches the navigation caller.
 * - The returned function restores the `pushState` captured here. Calling it
 *   again is harmless.
 *
 * Installing twice nests the wrappers, so each navigation then emits one Page
 * event per active installation.
 */
export function watchURLChanges(
  env: NavigationEnvironment,
  sendPage: (page: Page) => Promise<void>
): StopWatching {
  const { history } = env;
  const original = history.pushState;

  const emit = () => {
    const props = getPageProperties(env);
    let pending: Promise<void>;
    try {
      pending = sendPage({
        name: props.path,
        properties: { title: props.title, url: props.url },
      });
    } catch (err) {
      logger.warn("Failed to send page event for", props.path, err);
      return;
    }
    void pending.catch((err: unknown) => {
      logger.warn("Failed to send page event for", props.path, err);
    });
  };

  history.pushState = function pushState(
    ...args: Parameters<History["pushState"]>
  ) {
    const result = original.apply(history, args);
    emit();
    return result;
  };
  logger.log("Watching URL changes");

  return () => {
    history.pushState = original;
    logger.log("Stopped watching URL changes");
  };
}
