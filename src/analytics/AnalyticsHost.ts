import {
  validateEvent,
  type Alias,
  type EventKind,
  type Group,
  type Identify,
  type Page,
  type Screen,
  type Track,
} from "../contract/events";
import { createLogger } from "../utils/logger";
import type { IdentityManager } from "./IdentityManager";
import { toBaseMessage, type BaseMessage } from "./message";
import type { AnalyticsTransport, EventContext, RateLimiter, WireMessage } from "./types";
import { enrichEvent } from "./utils/enrichEvent";

const logger = createLogger("host");

export interface AnalyticsHostDeps {
  identity: IdentityManager;
  transport: () => AnalyticsTransport;
  context: () => EventContext;
  isReady: () => boolean;
  rateLimiter?: RateLimiter;
}

/**
 * Host-side analytics API. The command handlers go through it, and host code
 * can call it directly to send events of its own.
 */
export class AnalyticsHost {
  private rateLimiter: RateLimiter | null;

  constructor(private readonly deps: AnalyticsHostDeps) {
    this.rateLimiter = deps.rateLimiter ?? null;
  }

  /**
   * Sends one message: adds identity and context, applies the rate limiter,
   * hands it to the transport. An Alias switches the current user only once
   * the transport has accepted it.
   */
  async send(message: BaseMessage): Promise<void> {
    if (!this.deps.isReady()) {
      throw new Error("Analytics plugin is not ready");
    }
    logger.log("Sending analytics event:", message.type);

    const wire: WireMessage = enrichEvent(
      this.deps.identity.addIdentityInfo(message),
      this.deps.context()
    );

    if (this.rateLimiter && !this.rateLimiter(wire)) {
      logger.log("Rate limiter dropped", wire.type, "event", wire.messageId);
      return;
    }

    await this.deps.transport().send(wire);

    if (message.type === "alias" && message.userId) {
      const alreadyConnected = this.deps.identity.setUserId(message.userId);
      logger.log(
        "Alias to",
        message.userId,
        alreadyConnected ? "(already connected)" : "(newly connected)"
      );
    }
  }

  /**
   * Validates `event` as the given kind and sends it. Rejects with a
   * ValidationError before anything is queued if the event is malformed.
   */
  async sendEvent<K extends EventKind>(kind: K, event: unknown): Promise<void> {
    await this.send(toBaseMessage(kind, validateEvent(kind, event)));
  }

  /** Send an Identify event to the data plane. */
  sendIdentify(event: Identify): Promise<void> {
    return this.sendEvent("identify", event);
  }

  /** Send a Track event to the data plane. */
  sendTrack(event: Track): Promise<void> {
    return this.sendEvent("track", event);
  }

  /** Send a Page event to the data plane. */
  sendPage(event: Page): Promise<void> {
    return this.sendEvent("page", event);
  }

  /** Send a Screen event to the data plane. */
  sendScreen(event: Screen): Promise<void> {
    return this.sendEvent("screen", event);
  }

  /** Send a Group event to the data plane. */
  sendGroup(event: Group): Promise<void> {
    return this.sendEvent("group", event);
  }

  /** Send an Alias event to the data plane. */
  sendAlias(event: Alias): Promise<void> {
    return this.sendEvent("alias", event);
  }

  getAnonymousId(): string {
    return this.deps.identity.getAnonymousId();
  }

  /**
   * Sets the anonymous ID used by all subsequent events. Overwrites the
   * persisted one as well.
   */
  setAnonymousId(anonymousId: string): Promise<void> {
    return this.deps.identity.setAnonymousId(anonymousId);
  }

  setRateLimiter(rateLimiter: RateLimiter): void {
    this.rateLimiter = rateLimiter;
  }

  removeRateLimiter(): void {
    this.rateLimiter = null;
  }

  flush(): Promise<void> {
    return this.deps.transport().flush();
  }
}
