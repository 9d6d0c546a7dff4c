import type { EventKind } from "../contract/events";
import type { JsonObject, JsonValue } from "../contract/json";

/**
 * A message as the data plane receives it: one event kind plus identity and
 * the delivery metadata added on the host.
 */
export interface WireMessage {
  type: EventKind;
  messageId: string;
  anonymousId?: string;
  userId?: string;
  event?: string;
  name?: string;
  groupId?: string;
  previousId?: string;
  properties?: JsonObject;
  traits?: JsonObject;
  originalTimestamp?: string;
  context: EventContext;
  integrations?: JsonValue;
}

export interface EventContext {
  library: {
    name: string;
    version: string;
  };
  os: {
    name: string;
    version: string;
  };
  app?: {
    name: string;
    version: string;
  };
  locale: string;
  timezone: string;
  [key: string]: JsonValue | undefined; // allow arbitrary context
}

/** Decides whether a message may be sent. Returning false drops it. */
export type RateLimiter = (message: WireMessage) => boolean;

/** Delivers wire messages to the data plane. */
export interface AnalyticsTransport {
  /** Resolves once the message is accepted for delivery. */
  send(message: WireMessage): Promise<void>;
  flush(): Promise<void>;
  /** Stops background work after a final flush attempt. */
  shutdown(): Promise<void>;
}

export interface PluginOptions {
  /** Data plane base URL, e.g. "https://hosted.example.com". No trailing slash. */
  dataPlaneUrl: string;
  writeKey: string;
  /**
   * Overrides the persisted anonymous id. It has to be passed again on later
   * runs to keep the same identity.
   */
  anonymousId?: string;
  /** Directory holding the persisted config file. */
  configDir: string;
  debug?: boolean;
  flushIntervalSeconds?: number;
  /** Max events held in memory; oldest are dropped once cap is hit (default: 2000) */
  maxQueueEvents?: number;
  rateLimiter?: RateLimiter;
  /** Replaces the HTTP transport. */
  transport?: AnalyticsTransport;
  /** Reported as `context.app` on every message. */
  app?: {
    name: string;
    version: string;
  };
}

export type Lifecycle = "idle" | "initializing" | "ready" | "exited";
