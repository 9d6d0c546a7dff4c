import { COMMANDS, type Invoke } from "../contract/commands";
import { TransportError } from "../contract/errors";
import type {
  Alias,
  EventByKind,
  EventKind,
  Group,
  Identify,
  Page,
  Screen,
  Track,
} from "../contract/events";

/** One boundary call per event kind. */
export interface AnalyticsCommands {
  /** Send an Identify event to the data plane. */
  sendAnalyticsIdentify(event: Identify): Promise<void>;
  /** Send a Track event to the data plane. */
  sendAnalyticsTrack(event: Track): Promise<void>;
  /** Send a Page event to the data plane. */
  sendAnalyticsPage(event: Page): Promise<void>;
  /** Send a Screen event to the data plane. */
  sendAnalyticsScreen(event: Screen): Promise<void>;
  /** Send a Group event to the data plane. */
  sendAnalyticsGroup(event: Group): Promise<void>;
  /** Send an Alias event to the data plane. */
  sendAnalyticsAlias(event: Alias): Promise<void>;
}

/**
 * Binds the six commands to an {@link Invoke} implementation. Each call is
 * forwarded once, with no retry or buffering; any failure of the call,
 * synchronous or not, surfaces as a single {@link TransportError}.
 */
export function createCommands(invoke: Invoke): AnalyticsCommands {
  const call = async <K extends EventKind>(
    kind: K,
    event: EventByKind[K]
  ): Promise<void> => {
    const command = COMMANDS[kind];
    try {
      await invoke(command, event);
    } catch (err) {
      throw new TransportError(command, err);
    }
  };

  return {
    sendAnalyticsIdentify: (event) => call("identify", event),
    sendAnalyticsTrack: (event) => call("track", event),
    sendAnalyticsPage: (event) => call("page", event),
    sendAnalyticsScreen: (event) => call("screen", event),
    sendAnalyticsGroup: (event) => call("group", event),
    sendAnalyticsAlias: (event) => call("alias", event),
  };
}
