import type { Invoke } from "../contract/commands";
import {
  validateEvent,
  type Alias,
  type Group,
  type Identify,
  type Page,
  type Screen,
  type Track,
} from "../contract/events";
import { createLogger } from "../utils/logger";
import { createCommands } from "./commands";
import { browserEnvironment, type NavigationEnvironment } from "./environment";
import { addPageProperties } from "./pageContext";
import { watchURLChanges, type StopWatching } from "./watchURLChanges";

const logger = createLogger("guest");

export interface GuestAnalyticsOptions {
  invoke: Invoke;
  /**
   * Defaults to the window globals, resolved on first use by
   * `sendTrackEvent` or `watchURLChanges`. Without a window and without this
   * option those two fail with a plain `Error` (not a ValidationError or
   * TransportError) and nothing is sent; the other sends never need it.
   */
  environment?: NavigationEnvironment;
}

export interface GuestAnalytics {
  sendIdentifyEvent: (message: Identify) => Promise<void>;
  /** Adds `properties.page` (title, url, path) before sending. */
  sendTrackEvent: (message: Track) => Promise<void>;
  sendPageEvent: (page: Page) => Promise<void>;
  sendScreenEvent: (screen: Screen) => Promise<void>;
  sendGroupEvent: (message: Group) => Promise<void>;
  sendAliasEvent: (message: Alias) => Promise<void>;
  /**
   * Emits a Page event after every `history.pushState`.
   * @returns A function to stop watching for URL changes.
   */
  watchURLChanges: () => StopWatching;
}

/**
 * Creates the guest-side analytics surface over a boundary `invoke`.
 * Every send validates first, so a malformed event rejects with a
 * ValidationError and never reaches the host.
 */
export function createGuestAnalytics(
  options: GuestAnalyticsOptions
): GuestAnalytics {
  const commands = createCommands(options.invoke);
  let environment = options.environment;
  const env = () => {
    if (!environment) environment = browserEnvironment();
    return environment;
  };

  const sendPageEvent = async (page: Page) => {
    await commands.sendAnalyticsPage(validateEvent("page", page));
  };

  return {
    sendIdentifyEvent: async (message) => {
      await commands.sendAnalyticsIdentify(validateEvent("identify", message));
    },
    sendTrackEvent: async (message) => {
      const track = addPageProperties(validateEvent("track", message), env());
      logger.log("Tracking event:", track.event);
      await commands.sendAnalyticsTrack(track);
    },
    sendPageEvent,
    sendScreenEvent: async (screen) => {
      await commands.sendAnalyticsScreen(validateEvent("screen", screen));
    },
    sendGroupEvent: async (message) => {
      await commands.sendAnalyticsGroup(validateEvent("group", message));
    },
    sendAliasEvent: async (message) => {
      await commands.sendAnalyticsAlias(validateEvent("alias", message));
    },
    watchURLChanges: () => watchURLChanges(env(), sendPageEvent),
  };
}
